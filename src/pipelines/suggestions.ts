import { SearchResult, Suggestion } from "../domain/types.js";
import { collapseWhitespace, splitSentences, truncateAtWord } from "../utils/text.js";

const REFERENCE_SNIPPET_CHARS = 300;
const TEMPLATE_MAX_CHARS = 400;
const TEMPLATE_SENTENCES = 3;
const ANCHOR_WORDS = 5;

/** The last `windowChars` characters before the cursor. */
export function trailingContext(
  contextText: string,
  cursorPosition: number,
  windowChars: number,
): string {
  const cursor = Math.min(Math.max(Math.floor(cursorPosition), 0), contextText.length);
  const beforeCursor = contextText.slice(0, cursor);
  return beforeCursor.slice(Math.max(0, beforeCursor.length - windowChars));
}

/** The last sentence of the trailing context, used as the retrieval query. */
export function extractQueryText(
  contextText: string,
  cursorPosition: number,
  windowChars: number,
): string {
  const sentences = splitSentences(trailingContext(contextText, cursorPosition, windowChars));
  return collapseWhitespace(sentences[sentences.length - 1] ?? "");
}

export function buildSuggestionPrompt(
  userText: string,
  results: SearchResult[],
  maxContextChars: number,
): string {
  let references = results
    .map((result, idx) => `Reference ${idx + 1}: ${result.text.slice(0, REFERENCE_SNIPPET_CHARS)}`)
    .join("\n\n");
  if (references.length > maxContextChars) {
    references = `${references.slice(0, maxContextChars)}...`;
  }

  if (!references) {
    return ["Continue the following text naturally:", "", userText, "", "Continuation:"].join("\n");
  }

  return [
    "Based on the following reference materials, continue the text naturally.",
    "",
    "Reference Materials:",
    references,
    "",
    "Text to continue:",
    userText,
    "",
    "Continue the text naturally (write only the continuation, not the original text):",
  ].join("\n");
}

export function cleanGeneratedSuggestion(raw: string, userText: string, maxChars: number): string {
  let suggestion = raw.trim();

  if (suggestion.length >= 2 && suggestion.startsWith('"') && suggestion.endsWith('"')) {
    suggestion = suggestion.slice(1, -1).trim();
  }

  const typed = userText.trim();
  if (typed && suggestion.startsWith(typed)) {
    suggestion = suggestion.slice(typed.length).trim();
  }

  const sentences = splitSentences(suggestion);
  if (sentences.length > 2) {
    suggestion = sentences.slice(0, 2).join(" ");
  }

  return truncateAtWord(collapseWhitespace(suggestion), maxChars);
}

/**
 * Non-AI suggestions lifted from the retrieved text. When the end of what the
 * user typed appears in a result, the text that follows it is offered;
 * otherwise the opening sentences of the result are.
 */
export function buildTemplateSuggestions(
  results: SearchResult[],
  userText: string,
  count: number,
): Suggestion[] {
  const suggestions: Suggestion[] = [];
  const typedLower = collapseWhitespace(userText).toLowerCase();

  for (const result of results) {
    if (suggestions.length >= count) {
      break;
    }

    const text = continuationAfterAnchor(result.text, userText) ?? openingSentences(result.text);
    if (!text) {
      continue;
    }
    if (typedLower.includes(text.toLowerCase())) {
      continue;
    }
    if (suggestions.some((existing) => existing.text === text)) {
      continue;
    }

    suggestions.push({ text, origin: "template", sources: [result.attribution] });
  }

  return suggestions;
}

function continuationAfterAnchor(resultText: string, userText: string): string | null {
  const words = collapseWhitespace(userText).split(" ").filter(Boolean);
  if (words.length === 0) {
    return null;
  }

  const anchor = words.slice(-ANCHOR_WORDS).join(" ").toLowerCase();
  const haystack = collapseWhitespace(resultText);
  const position = haystack.toLowerCase().indexOf(anchor);
  if (position === -1) {
    return null;
  }

  const rest = haystack.slice(position + anchor.length).trim();
  const [firstSentence] = splitSentences(rest);
  return firstSentence ? truncateAtWord(firstSentence, TEMPLATE_MAX_CHARS) : null;
}

function openingSentences(resultText: string): string | null {
  const sentences = splitSentences(collapseWhitespace(resultText)).slice(0, TEMPLATE_SENTENCES);
  if (sentences.length === 0) {
    return null;
  }

  let suggestion = sentences.join(" ");
  if (!/[.!?]$/.test(suggestion)) {
    suggestion += ".";
  }
  return truncateAtWord(suggestion, TEMPLATE_MAX_CHARS);
}
