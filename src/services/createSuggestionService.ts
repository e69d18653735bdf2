import { AppConfig } from "../config/env.js";
import { CorruptIndexError } from "../domain/errors.js";
import { DefaultAiClient } from "../infra/ai/defaultAiClient.js";
import { AiClient } from "../infra/ai/types.js";
import { ResultCache } from "../infra/cache/resultCache.js";
import { OnlineSearchGateway } from "../infra/online/types.js";
import { WikipediaSearchClient } from "../infra/online/wikipediaSearchClient.js";
import { ExactVectorIndex } from "../infra/store/exactVectorIndex.js";
import { Logger, silentLogger } from "../utils/logger.js";
import { RetrievalOrchestrator } from "./retrievalOrchestrator.js";
import { Scheduler } from "./suggestionPipeline.js";
import { SuggestionService } from "./suggestionService.js";

const MAX_SUGGESTION_CHARS = 400;

export interface SuggestionServiceBootstrapOptions {
  logger?: Logger;
  aiClient?: AiClient;
  /** Overrides the Wikipedia client; null disables online fallback. */
  onlineSearch?: OnlineSearchGateway | null;
  scheduler?: Scheduler;
}

export interface SuggestionServiceBootstrapResult {
  service: SuggestionService;
  aiClient: AiClient;
  close: () => Promise<void>;
}

export async function createSuggestionService(
  config: AppConfig,
  options: SuggestionServiceBootstrapOptions = {},
): Promise<SuggestionServiceBootstrapResult> {
  const logger = options.logger ?? silentLogger;
  const aiClient = options.aiClient ?? new DefaultAiClient(config);

  const index = new ExactVectorIndex({
    dimension: config.vectorDimension,
    logger: logger.child("index"),
  });

  const cache = new ResultCache({
    filePath: config.cachePath,
    ttlMs: config.cacheTtlMs,
    maxEntries: config.cacheMaxEntries,
    logger: logger.child("cache"),
  });
  await cache.initialize();

  const onlineSearch =
    options.onlineSearch !== undefined
      ? options.onlineSearch
      : new WikipediaSearchClient({ endpoint: config.onlineSearchUrl });

  const orchestrator = new RetrievalOrchestrator({
    index,
    cache,
    onlineSearch,
    settings: {
      similarityThreshold: config.similarityThreshold,
      topK: config.topK,
      onlineSearchEnabled: config.onlineSearchEnabled,
      maxOnlineResults: config.maxOnlineResults,
      onlineTimeoutMs: config.onlineTimeoutMs,
      retainWeakLocalResults: config.retainWeakLocalResults,
    },
    logger: logger.child("retrieval"),
  });

  const service = new SuggestionService({
    index,
    embedder: aiClient,
    generator: aiClient,
    orchestrator,
    cache,
    scheduler: options.scheduler,
    logger: logger.child("service"),
    settings: {
      chunkSize: config.chunkSize,
      chunkOverlap: config.chunkOverlap,
      indexPath: config.indexPath,
      documentsDir: config.documentsDir,
      workerConcurrency: config.workerConcurrency,
      pipeline: {
        debounceMs: config.debounceMs,
        minTriggerChars: config.minTriggerChars,
        contextWindowChars: config.contextWindowChars,
        maxContextChars: config.maxContextChars,
        variantCount: config.suggestionVariants,
        maxSuggestionChars: MAX_SUGGESTION_CHARS,
        generationTimeoutMs: config.generationTimeoutMs,
      },
    },
  });

  let loaded = false;
  if (config.indexPath) {
    try {
      loaded = await index.load(config.indexPath);
    } catch (error) {
      if (!(error instanceof CorruptIndexError)) {
        throw error;
      }
      logger.error("persisted index is corrupt; rebuilding from documents", {
        path: config.indexPath,
        reason: error.message,
      });
      await service.rebuildIndex();
      loaded = true;
    }
  }

  if (!loaded && config.documentsDir) {
    await service.rebuildIndex();
  }

  return {
    service,
    aiClient,
    close: () => service.close(),
  };
}
