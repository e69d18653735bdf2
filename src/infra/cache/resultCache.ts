import { createHash } from "node:crypto";
import path from "node:path";
import { z } from "zod";
import { CacheCorruptionError, describeError } from "../../domain/errors.js";
import { CacheEntry, SearchResult } from "../../domain/types.js";
import { readFileIfExists, writeFileAtomic } from "../../utils/files.js";
import { Mutex } from "../../utils/locks.js";
import { Logger, silentLogger } from "../../utils/logger.js";
import { normalizeQuery } from "../../utils/text.js";

const CURRENT_FORMAT_VERSION = 1;

const searchResultSchema = z.object({
  chunkId: z.number().int().nullable(),
  score: z.number(),
  source: z.enum(["local", "online"]),
  text: z.string(),
  attribution: z.string(),
});

const persistedCacheSchema = z.object({
  format_version: z.literal(CURRENT_FORMAT_VERSION),
  entries: z.array(
    z.object({
      query_key: z.string(),
      fetched_at: z.number(),
      ttl_ms: z.number().nonnegative(),
      results: z.array(searchResultSchema),
    }),
  ),
});

type PersistedCache = z.infer<typeof persistedCacheSchema>;

export interface ResultCacheOptions {
  /** JSON file backing the cache; null keeps it in memory only. */
  filePath: string | null;
  ttlMs: number;
  maxEntries: number;
  now?: () => number;
  logger?: Logger;
}

export function createQueryKey(query: string): string {
  return createHash("sha256").update(normalizeQuery(query)).digest("hex");
}

/**
 * TTL- and LRU-bounded cache of online search results. The Map's insertion
 * order doubles as recency order: hits are moved to the end, eviction takes
 * from the front.
 */
export class ResultCache {
  private readonly entries = new Map<string, CacheEntry>();

  private readonly mutex = new Mutex();

  private writeChain: Promise<void> = Promise.resolve();

  private initialized = false;

  private readonly now: () => number;

  private readonly logger: Logger;

  constructor(private readonly options: ResultCacheOptions) {
    if (options.maxEntries < 1) {
      throw new RangeError(`Cache maxEntries must be at least 1, got ${options.maxEntries}.`);
    }
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? silentLogger;
  }

  async initialize(): Promise<void> {
    if (this.initialized) {
      return;
    }
    await this.mutex.runExclusive(async () => {
      if (this.initialized) {
        return;
      }
      await this.loadFromDisk();
      this.initialized = true;
    });
  }

  async get(queryKey: string): Promise<CacheEntry | null> {
    await this.initialize();
    return this.mutex.runExclusive(() => {
      const entry = this.entries.get(queryKey);
      if (!entry) {
        return null;
      }
      if (this.isExpired(entry)) {
        this.entries.delete(queryKey);
        return null;
      }
      this.entries.delete(queryKey);
      this.entries.set(queryKey, entry);
      return cloneEntry(entry);
    });
  }

  async put(queryKey: string, results: SearchResult[]): Promise<CacheEntry> {
    await this.initialize();
    const entry = await this.mutex.runExclusive(() => {
      const created: CacheEntry = {
        queryKey,
        results: results.map((result) => ({ ...result })),
        fetchedAt: this.now(),
        ttlMs: this.options.ttlMs,
      };
      this.entries.delete(queryKey);
      this.entries.set(queryKey, created);
      this.evictOverflow();
      return created;
    });

    await this.enqueueWrite();
    return cloneEntry(entry);
  }

  async size(): Promise<number> {
    await this.initialize();
    return this.mutex.runExclusive(() => this.entries.size);
  }

  async clear(): Promise<void> {
    await this.initialize();
    await this.mutex.runExclusive(() => {
      this.entries.clear();
    });
    await this.enqueueWrite();
  }

  /** Waits for pending writes to reach disk. */
  async close(): Promise<void> {
    await this.writeChain;
  }

  private isExpired(entry: CacheEntry): boolean {
    return this.now() - entry.fetchedAt >= entry.ttlMs;
  }

  private evictOverflow(): void {
    while (this.entries.size > this.options.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) {
        return;
      }
      this.entries.delete(oldest.value);
    }
  }

  private enqueueWrite(): Promise<void> {
    const task = () => this.persistNow();
    this.writeChain = this.writeChain.then(task, task);
    return this.writeChain;
  }

  private async persistNow(): Promise<void> {
    const filePath = this.options.filePath;
    if (!filePath) {
      return;
    }

    const serialized = await this.mutex.runExclusive(() => {
      const payload: PersistedCache = {
        format_version: CURRENT_FORMAT_VERSION,
        entries: [...this.entries.values()].map((entry) => ({
          query_key: entry.queryKey,
          fetched_at: entry.fetchedAt,
          ttl_ms: entry.ttlMs,
          results: entry.results,
        })),
      };
      return JSON.stringify(payload);
    });

    try {
      await writeFileAtomic(filePath, serialized);
    } catch (error) {
      // The in-memory cache stays usable; the next write retries the file.
      this.logger.warn("failed to persist result cache", {
        path: path.resolve(filePath),
        reason: describeError(error),
      });
    }
  }

  private async loadFromDisk(): Promise<void> {
    const filePath = this.options.filePath;
    if (!filePath) {
      return;
    }

    const raw = await readFileIfExists(filePath);
    if (raw === null) {
      return;
    }

    try {
      const persisted = parsePersistedCache(raw);
      for (const row of persisted.entries) {
        const entry: CacheEntry = {
          queryKey: row.query_key,
          results: row.results,
          fetchedAt: row.fetched_at,
          ttlMs: row.ttl_ms,
        };
        if (!this.isExpired(entry)) {
          this.entries.set(entry.queryKey, entry);
        }
      }
      this.evictOverflow();
      this.logger.info("result cache loaded", { entries: this.entries.size });
    } catch (error) {
      if (!(error instanceof CacheCorruptionError)) {
        throw error;
      }
      this.entries.clear();
      this.logger.warn("discarding corrupted result cache", {
        path: path.resolve(filePath),
        reason: error.message,
      });
    }
  }
}

function parsePersistedCache(raw: string): PersistedCache {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    throw new CacheCorruptionError("Cache file is not valid JSON.");
  }

  const parsed = persistedCacheSchema.safeParse(json);
  if (!parsed.success) {
    throw new CacheCorruptionError(`Cache file has an invalid layout: ${parsed.error.message}`);
  }
  return parsed.data;
}

function cloneEntry(entry: CacheEntry): CacheEntry {
  return {
    ...entry,
    results: entry.results.map((result) => ({ ...result })),
  };
}
