import { describe, expect, it } from "vitest";
import { createLogger } from "../src/utils/logger.js";

const LINE = /^\[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] \[([A-Z]+)\] \[([^\]]+)\] (.*)$/;

describe("createLogger", () => {
  it("writes level, scope, message and JSON data", () => {
    const lines: string[] = [];
    const logger = createLogger("suggest", "info", (line) => lines.push(line));

    logger.info("document indexed", { document: "notes.md", chunks: 3 });

    expect(lines).toHaveLength(1);
    const match = LINE.exec(lines[0]);
    expect(match?.[1]).toBe("INFO");
    expect(match?.[2]).toBe("suggest");
    expect(match?.[3]).toBe('document indexed {"document":"notes.md","chunks":3}');
  });

  it("drops messages below the configured level", () => {
    const lines: string[] = [];
    const logger = createLogger("suggest", "warn", (line) => lines.push(line));

    logger.debug("hidden");
    logger.info("hidden");
    logger.warn("shown");
    logger.error("shown too");

    expect(lines.map((line) => LINE.exec(line)?.[1])).toEqual(["WARN", "ERROR"]);
  });

  it("nests child scopes", () => {
    const lines: string[] = [];
    const logger = createLogger("suggest", "debug", (line) => lines.push(line)).child("session:a");

    logger.debug("tick");

    expect(LINE.exec(lines[0])?.[2]).toBe("suggest:session:a");
    expect(LINE.exec(lines[0])?.[3]).toBe("tick");
  });

  it("writes nothing when silent", () => {
    const lines: string[] = [];
    createLogger("suggest", "silent", (line) => lines.push(line)).error("nope");
    expect(lines).toEqual([]);
  });
});
