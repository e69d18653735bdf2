import { describe, expect, it } from "vitest";
import { SearchResult } from "../src/domain/types.js";
import {
  buildSuggestionPrompt,
  buildTemplateSuggestions,
  cleanGeneratedSuggestion,
  extractQueryText,
  trailingContext,
} from "../src/pipelines/suggestions.js";

function localResult(text: string, attribution = "notes/energy.md#0"): SearchResult {
  return { chunkId: 0, score: 0.8, source: "local", text, attribution };
}

describe("query extraction", () => {
  it("uses the last sentence before the cursor", () => {
    const text = "Intro line. The solar array produces power";
    expect(extractQueryText(text, text.length, 100)).toBe("The solar array produces power");
  });

  it("ignores text after the cursor and clamps the cursor", () => {
    expect(extractQueryText("Hello world. Second part", 5, 100)).toBe("Hello");
    expect(extractQueryText("Short", 99, 100)).toBe("Short");
    expect(extractQueryText("Short", -3, 100)).toBe("");
  });

  it("limits the context to the trailing window", () => {
    expect(trailingContext("abcdefghij", 10, 4)).toBe("ghij");
    expect(extractQueryText("abcdefghij", 8, 4)).toBe("efgh");
  });
});

describe("buildSuggestionPrompt", () => {
  it("asks for a plain continuation without references", () => {
    expect(buildSuggestionPrompt("Hello", [], 1500)).toBe(
      "Continue the following text naturally:\n\nHello\n\nContinuation:",
    );
  });

  it("numbers references and caps their total length", () => {
    const prompt = buildSuggestionPrompt("Solar power", [localResult("x".repeat(50))], 20);

    expect(prompt.startsWith("Based on the following reference materials")).toBe(true);
    expect(prompt).toContain("Reference Materials:\nReference 1: xxxxxxx...\n");
    expect(prompt).toContain("Text to continue:\nSolar power\n");
  });
});

describe("cleanGeneratedSuggestion", () => {
  it("strips wrapping quotes and keeps two sentences", () => {
    expect(cleanGeneratedSuggestion('"The sun rises. It sets. Then night."', "", 400)).toBe(
      "The sun rises. It sets.",
    );
  });

  it("drops an echoed copy of the typed text", () => {
    expect(cleanGeneratedSuggestion("I like cats because they purr.", "I like cats", 400)).toBe(
      "because they purr.",
    );
  });

  it("truncates long output at a word boundary", () => {
    expect(cleanGeneratedSuggestion("alpha beta gamma", "", 10)).toBe("alpha...");
  });
});

describe("buildTemplateSuggestions", () => {
  it("continues from where the typed text appears in a result", () => {
    const suggestions = buildTemplateSuggestions(
      [localResult("Solar panels convert sunlight into electricity. They last decades.")],
      "Solar panels convert",
      3,
    );

    expect(suggestions).toEqual([
      { text: "sunlight into electricity.", origin: "template", sources: ["notes/energy.md#0"] },
    ]);
  });

  it("offers the opening sentences when there is no anchor", () => {
    const suggestions = buildTemplateSuggestions(
      [localResult("First. Second. Third. Fourth."), localResult("no punctuation here", "web")],
      "unrelated words",
      3,
    );

    expect(suggestions.map((suggestion) => suggestion.text)).toEqual([
      "First. Second. Third.",
      "no punctuation here.",
    ]);
    expect(suggestions[1].sources).toEqual(["web"]);
  });

  it("skips text the user already typed and duplicates", () => {
    expect(buildTemplateSuggestions([localResult("Hello there.")], "I said hello there.", 3)).toEqual(
      [],
    );
    expect(
      buildTemplateSuggestions([localResult("Same text."), localResult("Same text.")], "zzz", 3),
    ).toHaveLength(1);
  });

  it("stops at the requested count", () => {
    const results = [localResult("One."), localResult("Two."), localResult("Three.")];
    expect(buildTemplateSuggestions(results, "zzz", 2).map((s) => s.text)).toEqual(["One.", "Two."]);
  });

  it("yields nothing without results", () => {
    expect(buildTemplateSuggestions([], "anything at all", 3)).toEqual([]);
  });
});
