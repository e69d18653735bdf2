import { promises as fs } from "node:fs";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { SearchResult } from "../src/domain/types.js";
import { createQueryKey, ResultCache } from "../src/infra/cache/resultCache.js";
import { createLogger } from "../src/utils/logger.js";

const TEMP_DIR = path.resolve(".tmp-tests-cache");
const TEMP_FILE = path.join(TEMP_DIR, "online-cache.json");

function onlineResult(text: string): SearchResult {
  return {
    chunkId: null,
    score: 1,
    source: "online",
    text,
    attribution: `https://example.org/${text}`,
  };
}

function createClock(start = 1_000) {
  let current = start;
  return {
    now: () => current,
    advance: (ms: number) => {
      current += ms;
    },
  };
}

describe("ResultCache", () => {
  afterEach(async () => {
    await fs.rm(TEMP_DIR, { recursive: true, force: true });
  });

  it("derives the same key for queries that differ in case and spacing", () => {
    expect(createQueryKey("  Solar  Panels ")).toBe(createQueryKey("solar panels"));
    expect(createQueryKey("solar panels")).toMatch(/^[0-9a-f]{64}$/);
    expect(createQueryKey("solar panel")).not.toBe(createQueryKey("solar panels"));
  });

  it("returns entries until their ttl elapses", async () => {
    const clock = createClock();
    const cache = new ResultCache({ filePath: null, ttlMs: 100, maxEntries: 10, now: clock.now });

    await cache.put("k", [onlineResult("alpha")]);
    clock.advance(99);
    const hit = await cache.get("k");
    expect(hit?.results.map((result) => result.text)).toEqual(["alpha"]);
    expect(hit?.fetchedAt).toBe(1_000);

    clock.advance(1);
    expect(await cache.get("k")).toBeNull();
    expect(await cache.size()).toBe(0);
  });

  it("overwrites an entry and restamps it", async () => {
    const clock = createClock();
    const cache = new ResultCache({ filePath: null, ttlMs: 100, maxEntries: 10, now: clock.now });

    await cache.put("k", [onlineResult("old")]);
    clock.advance(80);
    await cache.put("k", [onlineResult("new")]);
    clock.advance(80);

    const hit = await cache.get("k");
    expect(hit?.results[0].text).toBe("new");
    expect(hit?.fetchedAt).toBe(1_080);
  });

  it("evicts the least recently used entry", async () => {
    const cache = new ResultCache({ filePath: null, ttlMs: 10_000, maxEntries: 2 });

    await cache.put("a", [onlineResult("a")]);
    await cache.put("b", [onlineResult("b")]);
    await cache.get("a");
    await cache.put("c", [onlineResult("c")]);

    expect(await cache.get("b")).toBeNull();
    expect(await cache.get("a")).not.toBeNull();
    expect(await cache.get("c")).not.toBeNull();
  });

  it("hands out copies that callers cannot mutate", async () => {
    const cache = new ResultCache({ filePath: null, ttlMs: 10_000, maxEntries: 2 });
    await cache.put("k", [onlineResult("alpha")]);

    const first = await cache.get("k");
    first?.results.push(onlineResult("intruder"));

    expect((await cache.get("k"))?.results).toHaveLength(1);
  });

  it("reloads persisted entries and drops expired ones", async () => {
    const clock = createClock();
    const writer = new ResultCache({ filePath: TEMP_FILE, ttlMs: 100, maxEntries: 10, now: clock.now });
    await writer.put("old", [onlineResult("old")]);
    clock.advance(60);
    await writer.put("fresh", [onlineResult("fresh")]);
    await writer.close();

    clock.advance(50);
    const reader = new ResultCache({ filePath: TEMP_FILE, ttlMs: 100, maxEntries: 10, now: clock.now });
    await reader.initialize();

    expect(await reader.size()).toBe(1);
    expect((await reader.get("fresh"))?.results).toEqual([onlineResult("fresh")]);
    expect(await reader.get("old")).toBeNull();
  });

  it("starts empty and warns when the cache file is corrupt", async () => {
    await fs.mkdir(TEMP_DIR, { recursive: true });
    await fs.writeFile(TEMP_FILE, "{\"format_version\":1,\"entries\":\"broken\"}", "utf-8");
    const lines: string[] = [];
    const logger = createLogger("cache", "warn", (line) => lines.push(line));

    const cache = new ResultCache({ filePath: TEMP_FILE, ttlMs: 100, maxEntries: 10, logger });
    await cache.initialize();

    expect(await cache.size()).toBe(0);
    expect(lines).toHaveLength(1);
    expect(lines[0]).toContain("[WARN] [cache] discarding corrupted result cache");

    await cache.put("k", [onlineResult("alpha")]);
    await cache.close();
    const persisted = JSON.parse(await fs.readFile(TEMP_FILE, "utf-8"));
    expect(persisted.entries).toHaveLength(1);
  });

  it("rejects a non-positive capacity", () => {
    expect(() => new ResultCache({ filePath: null, ttlMs: 1, maxEntries: 0 })).toThrow(RangeError);
  });
});
