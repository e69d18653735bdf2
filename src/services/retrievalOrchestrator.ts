import { describeError, OnlineFallbackError } from "../domain/errors.js";
import { IndexHit, OnlineSearchHit, SearchResult } from "../domain/types.js";
import { VectorIndex } from "../domain/vectorIndex.js";
import { createQueryKey, ResultCache } from "../infra/cache/resultCache.js";
import { OnlineSearchGateway } from "../infra/online/types.js";
import { withTimeout } from "../utils/async.js";
import { Logger, silentLogger } from "../utils/logger.js";

export interface RetrievalSettings {
  similarityThreshold: number;
  topK: number;
  onlineSearchEnabled: boolean;
  maxOnlineResults: number;
  onlineTimeoutMs: number;
  /** Keep sub-threshold local hits (ahead of online ones) when the fallback fires. */
  retainWeakLocalResults: boolean;
}

export interface RetrievalOrchestratorDeps {
  index: VectorIndex;
  cache: ResultCache | null;
  onlineSearch: OnlineSearchGateway | null;
  settings: RetrievalSettings;
  logger?: Logger;
}

export interface RetrievalRequest {
  queryText: string;
  queryVector: number[];
  topK?: number;
  similarityThreshold?: number;
}

export interface RetrievalOutcome {
  query: string;
  results: SearchResult[];
  fallbackTriggered: boolean;
  cacheHit: boolean;
  onlineError: string | null;
  topLocalScore: number | null;
}

interface OnlineFetch {
  results: SearchResult[];
  cacheHit: boolean;
  error: string | null;
}

/**
 * Local-first retrieval. The online gateway is consulted only when the index
 * has no hit at or above the similarity threshold, and local hits always rank
 * ahead of online ones whatever their scores.
 */
export class RetrievalOrchestrator {
  private readonly logger: Logger;

  /** Online lookups in progress, keyed like the cache; concurrent callers share one. */
  private readonly inFlight = new Map<string, Promise<OnlineFetch>>();

  constructor(private readonly deps: RetrievalOrchestratorDeps) {
    this.logger = deps.logger ?? silentLogger;
  }

  get settings(): RetrievalSettings {
    return this.deps.settings;
  }

  async retrieve(request: RetrievalRequest): Promise<RetrievalOutcome> {
    const topK = request.topK ?? this.deps.settings.topK;
    const threshold = request.similarityThreshold ?? this.deps.settings.similarityThreshold;

    const hits = await this.deps.index.search(request.queryVector, topK);
    const local = hits.map(toLocalResult).sort((a, b) => b.score - a.score);
    const topLocalScore = local.length > 0 ? local[0].score : null;

    if (topLocalScore !== null && topLocalScore >= threshold) {
      return this.finish(request.queryText, {
        query: request.queryText,
        results: local.slice(0, topK),
        fallbackTriggered: false,
        cacheHit: false,
        onlineError: null,
        topLocalScore,
      });
    }

    const online = await this.fetchOnline(request.queryText);
    const kept = this.deps.settings.retainWeakLocalResults ? local : [];

    return this.finish(request.queryText, {
      query: request.queryText,
      results: [...kept, ...online.results].slice(0, topK),
      fallbackTriggered: true,
      cacheHit: online.cacheHit,
      onlineError: online.error,
      topLocalScore,
    });
  }

  private async fetchOnline(queryText: string): Promise<OnlineFetch> {
    const gateway = this.deps.onlineSearch;
    if (!this.deps.settings.onlineSearchEnabled || !gateway || !queryText.trim()) {
      return { results: [], cacheHit: false, error: null };
    }

    const queryKey = createQueryKey(queryText);
    const pending = this.inFlight.get(queryKey);
    if (pending) {
      return pending;
    }

    const lookup = this.lookupOnline(gateway, queryKey, queryText).finally(() => {
      this.inFlight.delete(queryKey);
    });
    this.inFlight.set(queryKey, lookup);
    return lookup;
  }

  private async lookupOnline(
    gateway: OnlineSearchGateway,
    queryKey: string,
    queryText: string,
  ): Promise<OnlineFetch> {
    const cached = await this.readCache(queryKey);
    if (cached) {
      return { results: cached, cacheHit: true, error: null };
    }

    const { maxOnlineResults, onlineTimeoutMs } = this.deps.settings;
    let hits: OnlineSearchHit[];
    try {
      hits = await withTimeout(
        (signal) => gateway.search(queryText, maxOnlineResults, signal),
        onlineTimeoutMs,
      );
    } catch (error) {
      const failure = new OnlineFallbackError(describeError(error));
      this.logger.warn("online fallback failed; continuing with local results", {
        query: queryText,
        reason: failure.message,
      });
      return { results: [], cacheHit: false, error: failure.message };
    }

    const results = hits.slice(0, maxOnlineResults).map(toOnlineResult);
    if (results.length > 0) {
      await this.writeCache(queryKey, results);
    }
    return { results, cacheHit: false, error: null };
  }

  private async readCache(queryKey: string): Promise<SearchResult[] | null> {
    if (!this.deps.cache) {
      return null;
    }
    try {
      const entry = await this.deps.cache.get(queryKey);
      return entry ? entry.results : null;
    } catch (error) {
      this.logger.warn("result cache read failed", { reason: describeError(error) });
      return null;
    }
  }

  private async writeCache(queryKey: string, results: SearchResult[]): Promise<void> {
    if (!this.deps.cache) {
      return;
    }
    try {
      await this.deps.cache.put(queryKey, results);
    } catch (error) {
      this.logger.warn("result cache write failed", { reason: describeError(error) });
    }
  }

  private finish(queryText: string, outcome: RetrievalOutcome): RetrievalOutcome {
    this.logger.info("retrieval", {
      query: queryText,
      fallback: outcome.fallbackTriggered,
      cache_hit: outcome.cacheHit,
      results: outcome.results.map((result) => ({
        source: result.source,
        score: Number(result.score.toFixed(4)),
      })),
    });
    return outcome;
  }
}

function toLocalResult(hit: IndexHit): SearchResult {
  return {
    chunkId: hit.chunk.id,
    score: hit.score,
    source: "local",
    text: hit.chunk.text,
    attribution: `${hit.chunk.documentRef}#${hit.chunk.index}`,
  };
}

function toOnlineResult(hit: OnlineSearchHit): SearchResult {
  return {
    chunkId: null,
    score: hit.score,
    source: "online",
    text: hit.text,
    attribution: hit.attribution,
  };
}
