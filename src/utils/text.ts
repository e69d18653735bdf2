const WORD_REGEX = /[\p{L}\p{N}]+/gu;

const SENTENCE_END_REGEX = /[.!?]+["')\]]*\s+/g;

export function normalizeText(text: string): string {
  return text.replace(/\r\n/g, "\n").replace(/\t/g, " ").trim();
}

export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

/** Lower-cased, whitespace-collapsed form used for cache keys and comparisons. */
export function normalizeQuery(query: string): string {
  return collapseWhitespace(query.toLowerCase());
}

export function tokenizeWords(text: string): string[] {
  const words = text.toLowerCase().match(WORD_REGEX) ?? [];

  const expanded: string[] = [];
  for (const word of words) {
    expanded.push(...expandTokenVariants(word));
  }
  return expanded;
}

export function splitSentences(text: string): string[] {
  const sentences: string[] = [];
  let start = 0;
  for (const match of text.matchAll(SENTENCE_END_REGEX)) {
    const end = (match.index ?? 0) + match[0].length;
    const sentence = text.slice(start, end).trim();
    if (sentence) {
      sentences.push(sentence);
    }
    start = end;
  }

  const tail = text.slice(start).trim();
  if (tail) {
    sentences.push(tail);
  }
  return sentences;
}

export function truncateAtWord(text: string, maxChars: number): string {
  if (text.length <= maxChars) {
    return text;
  }
  const cut = text.slice(0, maxChars);
  const lastSpace = cut.lastIndexOf(" ");
  return `${(lastSpace > 0 ? cut.slice(0, lastSpace) : cut).trimEnd()}...`;
}

function expandTokenVariants(token: string): string[] {
  const trimmed = token.trim();
  if (!trimmed) {
    return [];
  }

  const variants = new Set<string>([trimmed]);
  const isAscii = !/[^\x00-\x7f]/.test(trimmed);
  if (isAscii && trimmed.length >= 4 && trimmed.endsWith("s") && !trimmed.endsWith("ss")) {
    variants.add(trimmed.slice(0, -1));
  }

  return [...variants].filter((word) => {
    const hasUnicode = /[^\x00-\x7f]/.test(word);
    return hasUnicode ? word.length >= 1 : word.length >= 2;
  });
}
