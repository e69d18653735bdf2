import { SearchResult, Suggestion } from "../domain/types.js";
import { collapseWhitespace, splitSentences, truncateAtWord } from "../utils/text.js";

export type RewriteMode = "refine" | "expand";

const REFERENCE_SNIPPET_CHARS = 300;
const MIN_ALTERNATIVE_CHARS = 10;
const EXPANSION_SOURCES = 2;

export function ensureSentenceEnd(text: string): string {
  if (!text || /[.!?]$/.test(text)) {
    return text;
  }
  return `${text}.`;
}

/** Whitespace collapsed and closing punctuation added. */
export function cleanupSelection(selectedText: string): string {
  return ensureSentenceEnd(collapseWhitespace(selectedText));
}

function firstSentence(text: string): string | null {
  const [sentence] = splitSentences(collapseWhitespace(text));
  return sentence ? ensureSentenceEnd(sentence) : null;
}

/** Opening sentence of the best result, phrased the way the corpus phrases it. */
export function refinementFromResults(
  results: SearchResult[],
): { text: string; source: string } | null {
  for (const result of results) {
    const sentence = firstSentence(result.text);
    if (sentence) {
      return { text: sentence, source: result.attribution };
    }
  }
  return null;
}

/**
 * The selection followed by the opening sentence of the top results. Returns
 * null when no result adds a sentence the selection does not already hold.
 */
export function expansionFromResults(
  selectedText: string,
  results: SearchResult[],
): { text: string; sources: string[] } | null {
  const base = cleanupSelection(selectedText);
  const seen = new Set([base.toLowerCase()]);
  const parts = [base];
  const sources: string[] = [];

  for (const result of results.slice(0, EXPANSION_SOURCES)) {
    const sentence = firstSentence(result.text);
    if (!sentence) {
      continue;
    }
    const key = sentence.toLowerCase();
    if (seen.has(key) || base.toLowerCase().includes(key)) {
      continue;
    }
    seen.add(key);
    parts.push(sentence);
    sources.push(result.attribution);
  }

  return parts.length > 1 ? { text: parts.join(" "), sources } : null;
}

/** One differently worded sentence per result, in result order. */
export function alternativesFromResults(
  selectedText: string,
  results: SearchResult[],
  count: number,
): Suggestion[] {
  const selected = cleanupSelection(selectedText).toLowerCase();
  const alternatives: Suggestion[] = [];

  for (const result of results) {
    if (alternatives.length >= count) {
      break;
    }
    const candidate = splitSentences(collapseWhitespace(result.text))
      .map(ensureSentenceEnd)
      .find(
        (sentence) =>
          sentence.length > MIN_ALTERNATIVE_CHARS && sentence.toLowerCase() !== selected,
      );
    if (candidate && !alternatives.some((existing) => existing.text === candidate)) {
      alternatives.push({ text: candidate, origin: "template", sources: [result.attribution] });
    }
  }

  return alternatives;
}

export function buildRewritePrompt(
  mode: RewriteMode,
  selectedText: string,
  surroundingText: string,
  results: SearchResult[],
  maxContextChars: number,
): string {
  let references = results
    .map((result, idx) => `Reference ${idx + 1}: ${result.text.slice(0, REFERENCE_SNIPPET_CHARS)}`)
    .join("\n\n");
  if (references.length > maxContextChars) {
    references = `${references.slice(0, maxContextChars)}...`;
  }

  const instruction =
    mode === "refine"
      ? "Rewrite the selected text so it reads clearly, keeping its meaning and the style of the references."
      : "Expand the selected text with relevant details from the references, keeping its voice.";

  const lines = [instruction, ""];
  if (references) {
    lines.push("Reference Materials:", references, "");
  }
  const surrounding = collapseWhitespace(surroundingText);
  if (surrounding) {
    lines.push("Surrounding text:", truncateAtWord(surrounding, maxContextChars), "");
  }
  lines.push("Selected text:", selectedText.trim(), "", "Write only the new version of the selected text:");
  return lines.join("\n");
}

export function cleanRewrite(raw: string, maxChars: number): string {
  let text = raw.trim();
  if (text.length >= 2 && text.startsWith('"') && text.endsWith('"')) {
    text = text.slice(1, -1).trim();
  }
  return truncateAtWord(collapseWhitespace(text), maxChars);
}
