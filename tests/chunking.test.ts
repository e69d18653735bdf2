import { describe, expect, it } from "vitest";
import { joinChunkSpans, splitIntoChunks } from "../src/pipelines/chunking.js";

const SAMPLE = [
  "Local retrieval keeps suggestions grounded in the writer's own notes.",
  "Each document is split into overlapping chunks before it is embedded.",
  "Chunks end on sentence boundaries so no sentence is cut in half.",
  "",
  "The overlap carries the end of one chunk into the start of the next.",
  "Online results are only used when nothing local is similar enough.",
].join("\n");

describe("chunking pipeline", () => {
  it("splits a 1000-character text into the expected 512/50 spans", () => {
    const text = `${`${"a".repeat(62)}. `.repeat(15)}${"b".repeat(39)}.`;
    expect(text).toHaveLength(1000);

    const spans = splitIntoChunks(text, 512, 50);

    expect(spans.map((span) => [span.startOffset, span.endOffset])).toEqual([
      [0, 512],
      [462, 960],
      [910, 1000],
    ]);
    expect(spans.map((span) => span.index)).toEqual([0, 1, 2]);
  });

  it("covers the whole text with spans that slice the input", () => {
    const spans = splitIntoChunks(SAMPLE, 120, 30);

    expect(spans.length).toBeGreaterThan(1);
    expect(spans[0].startOffset).toBe(0);
    expect(spans[spans.length - 1].endOffset).toBe(SAMPLE.length);
    for (const span of spans) {
      expect(span.text).toBe(SAMPLE.slice(span.startOffset, span.endOffset));
    }
    expect(joinChunkSpans(spans)).toBe(SAMPLE);
  });

  it("is deterministic", () => {
    expect(splitIntoChunks(SAMPLE, 100, 20)).toEqual(splitIntoChunks(SAMPLE, 100, 20));
  });

  it("keeps short text in a single chunk", () => {
    const spans = splitIntoChunks("Just one sentence here.", 512, 50);
    expect(spans).toEqual([
      { index: 0, text: "Just one sentence here.", startOffset: 0, endOffset: 23 },
    ]);
  });

  it("returns no chunks for blank text", () => {
    expect(splitIntoChunks("", 512, 50)).toEqual([]);
    expect(splitIntoChunks("  \n\t ", 512, 50)).toEqual([]);
  });

  it("keeps an overlong sentence whole in its own chunk", () => {
    const text = `${"x".repeat(600)}. Short tail.`;
    const spans = splitIntoChunks(text, 100, 10);

    expect(spans.map((span) => [span.startOffset, span.endOffset])).toEqual([
      [0, 602],
      [592, 613],
    ]);
  });

  it("places chunks edge to edge when overlap is zero", () => {
    const spans = splitIntoChunks("Alpha one. Beta two. Gamma three.", 12, 0);
    expect(spans.map((span) => span.text)).toEqual(["Alpha one. ", "Beta two. ", "Gamma three."]);
  });

  it("rejects a non-positive chunk size", () => {
    expect(() => splitIntoChunks("text", 0, 0)).toThrow(RangeError);
  });
});
