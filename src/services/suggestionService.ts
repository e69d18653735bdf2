import path from "node:path";
import {
  describeError,
  DimensionMismatchError,
  EmbeddingUnavailableError,
  IngestionError,
} from "../domain/errors.js";
import { DocumentRecord, SearchResult, Suggestion, SuggestionOrigin } from "../domain/types.js";
import { IndexStats, VectorIndex } from "../domain/vectorIndex.js";
import { EmbeddingGateway, GenerationGateway } from "../infra/ai/types.js";
import { ResultCache } from "../infra/cache/resultCache.js";
import { listDocumentFiles, loadDocumentText } from "../infra/parsers/documentLoader.js";
import { splitIntoChunks } from "../pipelines/chunking.js";
import {
  alternativesFromResults,
  buildRewritePrompt,
  cleanRewrite,
  cleanupSelection,
  expansionFromResults,
  refinementFromResults,
  RewriteMode,
} from "../pipelines/refinement.js";
import { withTimeout } from "../utils/async.js";
import { Logger, silentLogger } from "../utils/logger.js";
import { BoundedTaskQueue } from "../utils/taskQueue.js";
import { RetrievalOrchestrator, RetrievalOutcome } from "./retrievalOrchestrator.js";
import {
  Scheduler,
  SuggestionOutcome,
  SuggestionPipeline,
  SuggestionPipelineSettings,
  SuggestionStage,
} from "./suggestionPipeline.js";

export interface FailedIndexing {
  path: string;
  reason: string;
}

export interface IndexDocumentsResult {
  indexed_count: number;
  chunk_count: number;
  failed: FailedIndexing[];
}

export interface RebuildIndexResult extends IndexDocumentsResult {
  documents_dir: string | null;
}

export interface RawDocumentInput {
  source: string;
  content: string;
}

export interface ServiceStats extends IndexStats {
  cacheEntries: number;
  sessions: number;
}

export interface TextRewrite {
  text: string;
  /** `cleanup` and `unchanged` mean neither a generator nor the index had anything to offer. */
  origin: SuggestionOrigin | "cleanup" | "unchanged";
  sources: string[];
  retrieval: RetrievalOutcome;
}

export interface AlternativesResult {
  alternatives: Suggestion[];
  retrieval: RetrievalOutcome;
}

export type SuggestionEvent =
  | {
      type: "suggestions";
      sessionId: string;
      requestId: number;
      suggestions: Suggestion[];
      retrieval: RetrievalOutcome;
    }
  | { type: "error"; sessionId: string; requestId: number; error: Error };

export type SuggestionListener = (event: SuggestionEvent) => void;

export interface SuggestionServiceSettings {
  chunkSize: number;
  chunkOverlap: number;
  /** Where the index is persisted after each change; null keeps it in memory. */
  indexPath: string | null;
  documentsDir: string | null;
  workerConcurrency: number;
  pipeline: SuggestionPipelineSettings;
}

export interface SuggestionServiceDeps {
  index: VectorIndex;
  embedder: EmbeddingGateway;
  generator: GenerationGateway | null;
  orchestrator: RetrievalOrchestrator;
  cache: ResultCache | null;
  settings: SuggestionServiceSettings;
  scheduler?: Scheduler;
  logger?: Logger;
}

interface RequestRoute {
  sessionId: string;
  settled: Promise<SuggestionOutcome>;
}

const DEFAULT_SESSION = "default";
const RETAINED_REQUEST_ROUTES = 512;
const REFINE_QUERY_CHARS = 200;
const REFINE_TOP_K = 3;
const EXPAND_TOP_K = 5;
const REWRITE_MAX_CHARS = 1_200;

export class SuggestionService {
  private readonly sessions = new Map<string, SuggestionPipeline>();

  private readonly requestRoutes = new Map<number, RequestRoute>();

  private readonly listeners = new Set<SuggestionListener>();

  private readonly logger: Logger;

  private requestCounter = 0;

  private closed = false;

  constructor(private readonly deps: SuggestionServiceDeps) {
    this.logger = deps.logger ?? silentLogger;
  }

  /** Chunks, embeds and stores one document, replacing any earlier version. */
  async indexDocument(documentRef: string, rawText: string): Promise<number> {
    const chunkCount = await this.indexSingleDocument(documentRef, rawText);
    await this.persistIndex();
    return chunkCount;
  }

  async indexDocuments(paths: string[]): Promise<IndexDocumentsResult> {
    const result = await this.indexBatch(
      paths.map((rawPath) => ({
        label: rawPath,
        load: async () => {
          const absolutePath = path.resolve(rawPath);
          try {
            return { ref: absolutePath, content: await loadDocumentText(absolutePath) };
          } catch (error) {
            throw new IngestionError(describeError(error), rawPath);
          }
        },
      })),
    );
    await this.persistIfChanged(result);
    return result;
  }

  async indexRawDocuments(documents: RawDocumentInput[]): Promise<IndexDocumentsResult> {
    const result = await this.indexBatch(
      documents.map((item, position) => {
        const source = normalizeSourceName(item.source, position);
        return {
          label: source,
          load: async () => ({ ref: `upload://${source}`, content: item.content }),
        };
      }),
    );
    await this.persistIfChanged(result);
    return result;
  }

  async removeDocument(documentRef: string): Promise<number> {
    const removed = await this.deps.index.removeDocument(documentRef);
    if (removed > 0) {
      this.logger.info("document removed", { document: documentRef, chunks: removed });
      await this.persistIndex();
    }
    return removed;
  }

  listSources(): DocumentRecord[] {
    return this.deps.index.listDocuments();
  }

  async getIndexStats(): Promise<ServiceStats> {
    return {
      ...this.deps.index.stats(),
      cacheEntries: this.deps.cache ? await this.deps.cache.size() : 0,
      sessions: this.sessions.size,
    };
  }

  async retrieveContext(query: string, topK?: number): Promise<RetrievalOutcome> {
    const queryVector = await this.deps.embedder.embedQuery(query);
    return this.deps.orchestrator.retrieve({ queryText: query, queryVector, topK });
  }

  querySuggestions(
    contextText: string,
    cursorPosition: number,
    sessionId: string = DEFAULT_SESSION,
  ): number {
    return this.submit(contextText, cursorPosition, sessionId).requestId;
  }

  /** Submits like `querySuggestions` and waits for the request to settle. */
  async suggest(
    contextText: string,
    cursorPosition: number,
    sessionId: string = DEFAULT_SESSION,
  ): Promise<SuggestionOutcome> {
    return this.submit(contextText, cursorPosition, sessionId).settled;
  }

  /** The settled outcome of a request submitted earlier; undefined once it is forgotten. */
  waitForSuggestion(requestId: number): Promise<SuggestionOutcome> | undefined {
    return this.requestRoutes.get(requestId)?.settled;
  }

  /** Rewrites a selection in the style of the closest indexed text. */
  async refineText(selectedText: string, surroundingText = ""): Promise<TextRewrite> {
    const selected = requireSelection(selectedText);
    const retrieval = await this.retrieveContext(selected.slice(0, REFINE_QUERY_CHARS), REFINE_TOP_K);

    const generated = await this.generateRewrite("refine", selected, surroundingText, retrieval.results);
    let rewrite: TextRewrite;
    if (generated) {
      rewrite = { text: generated, origin: "generated", sources: attributions(retrieval.results), retrieval };
    } else {
      const refined = refinementFromResults(retrieval.results);
      rewrite = refined
        ? { text: refined.text, origin: "template", sources: [refined.source], retrieval }
        : { text: cleanupSelection(selected), origin: "cleanup", sources: [], retrieval };
    }

    this.logger.info("text refined", { origin: rewrite.origin, sources: rewrite.sources });
    return rewrite;
  }

  /** Extends a selection with related sentences from the index or the online fallback. */
  async expandText(selectedText: string, surroundingText = ""): Promise<TextRewrite> {
    const selected = requireSelection(selectedText);
    const retrieval = await this.retrieveContext(selected, EXPAND_TOP_K);

    const generated = await this.generateRewrite("expand", selected, surroundingText, retrieval.results);
    let rewrite: TextRewrite;
    if (generated) {
      rewrite = { text: generated, origin: "generated", sources: attributions(retrieval.results), retrieval };
    } else {
      const expansion = expansionFromResults(selected, retrieval.results);
      rewrite = expansion
        ? { text: expansion.text, origin: "template", sources: expansion.sources, retrieval }
        : { text: selected, origin: "unchanged", sources: [], retrieval };
    }

    this.logger.info("text expanded", { origin: rewrite.origin, sources: rewrite.sources });
    return rewrite;
  }

  async alternatives(selectedText: string, count = 3): Promise<AlternativesResult> {
    const selected = requireSelection(selectedText);
    const retrieval = await this.retrieveContext(selected, count * 2);
    return { alternatives: alternativesFromResults(selected, retrieval.results, count), retrieval };
  }

  subscribe(listener: SuggestionListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  cancel(requestId: number): boolean {
    const route = this.requestRoutes.get(requestId);
    if (!route) {
      return false;
    }
    return this.sessions.get(route.sessionId)?.cancel(requestId) ?? false;
  }

  getRequestStage(requestId: number): SuggestionStage | undefined {
    const route = this.requestRoutes.get(requestId);
    if (!route) {
      return undefined;
    }
    return this.sessions.get(route.sessionId)?.getStage(requestId);
  }

  closeSession(sessionId: string): boolean {
    const pipeline = this.sessions.get(sessionId);
    if (!pipeline) {
      return false;
    }
    pipeline.dispose();
    this.sessions.delete(sessionId);
    return true;
  }

  /** Clears the index and re-indexes every supported file under the documents directory. */
  async rebuildIndex(): Promise<RebuildIndexResult> {
    const documentsDir = this.deps.settings.documentsDir;
    await this.deps.index.clear();

    let result: IndexDocumentsResult = { indexed_count: 0, chunk_count: 0, failed: [] };
    if (documentsDir) {
      const files = await listDocumentFiles(documentsDir);
      result = await this.indexBatch(
        files.map((filePath) => ({
          label: filePath,
          load: async () => {
            try {
              return { ref: filePath, content: await loadDocumentText(filePath) };
            } catch (error) {
              throw new IngestionError(describeError(error), filePath);
            }
          },
        })),
      );
    } else {
      this.logger.warn("DOCUMENTS_DIR is not set; index rebuilt empty");
    }

    await this.persistIndex();
    this.logger.info("index rebuilt", {
      documents_dir: documentsDir,
      indexed: result.indexed_count,
      chunks: result.chunk_count,
      failed: result.failed.length,
    });
    return { ...result, documents_dir: documentsDir };
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    for (const pipeline of this.sessions.values()) {
      pipeline.dispose();
    }
    this.sessions.clear();
    this.listeners.clear();
    await this.persistIndex();
    await this.deps.cache?.close();
  }

  private submit(contextText: string, cursorPosition: number, sessionId: string) {
    if (this.closed) {
      throw new Error("Suggestion service is closed.");
    }
    const handle = this.sessionPipeline(sessionId).submit({ contextText, cursorPosition });
    this.requestRoutes.set(handle.requestId, { sessionId, settled: handle.settled });
    this.pruneRequestRoutes();
    return handle;
  }

  private sessionPipeline(sessionId: string): SuggestionPipeline {
    const existing = this.sessions.get(sessionId);
    if (existing) {
      return existing;
    }

    const pipeline = new SuggestionPipeline({
      embedder: this.deps.embedder,
      orchestrator: this.deps.orchestrator,
      generator: this.deps.generator,
      settings: this.deps.settings.pipeline,
      // Each session gets its own worker so a stalled request only holds up its own editor.
      queue: new BoundedTaskQueue(this.deps.settings.workerConcurrency),
      scheduler: this.deps.scheduler,
      nextRequestId: () => {
        this.requestCounter += 1;
        return this.requestCounter;
      },
      logger: this.logger.child(`session:${sessionId}`),
      callbacks: {
        onSuggestions: ({ requestId, suggestions, retrieval }) =>
          this.emit({ type: "suggestions", sessionId, requestId, suggestions, retrieval }),
        onError: ({ requestId, error }) => this.emit({ type: "error", sessionId, requestId, error }),
      },
    });
    this.sessions.set(sessionId, pipeline);
    return pipeline;
  }

  private emit(event: SuggestionEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error) {
        this.logger.error("suggestion listener threw", {
          request_id: event.requestId,
          reason: describeError(error),
        });
      }
    }
  }

  private pruneRequestRoutes(): void {
    for (const requestId of this.requestRoutes.keys()) {
      if (this.requestRoutes.size <= RETAINED_REQUEST_ROUTES) {
        return;
      }
      this.requestRoutes.delete(requestId);
    }
  }

  private async generateRewrite(
    mode: RewriteMode,
    selectedText: string,
    surroundingText: string,
    results: SearchResult[],
  ): Promise<string | null> {
    const generator = this.deps.generator;
    if (!generator || !generator.isAvailable()) {
      return null;
    }

    const { maxContextChars, generationTimeoutMs } = this.deps.settings.pipeline;
    const prompt = buildRewritePrompt(mode, selectedText, surroundingText, results, maxContextChars);
    try {
      const [raw] = await withTimeout(
        (signal) => generator.generate(prompt, 1, signal),
        generationTimeoutMs,
      );
      const text = raw === undefined ? "" : cleanRewrite(raw, REWRITE_MAX_CHARS);
      return text || null;
    } catch (error) {
      this.logger.warn("rewrite generation failed; using retrieved text", {
        mode,
        reason: describeError(error),
      });
      return null;
    }
  }

  private async indexBatch(
    items: Array<{ label: string; load: () => Promise<{ ref: string; content: string }> }>,
  ): Promise<IndexDocumentsResult> {
    const failed: FailedIndexing[] = [];
    let indexedCount = 0;
    let chunkCount = 0;

    for (const item of items) {
      try {
        const { ref, content } = await item.load();
        chunkCount += await this.indexSingleDocument(ref, content);
        indexedCount += 1;
      } catch (error) {
        // A broken provider fails every document alike, so the batch stops.
        if (error instanceof EmbeddingUnavailableError || error instanceof DimensionMismatchError) {
          throw error;
        }
        const reason = describeError(error);
        this.logger.warn("skipping document", { document: item.label, reason });
        failed.push({ path: item.label, reason });
      }
    }

    return { indexed_count: indexedCount, chunk_count: chunkCount, failed };
  }

  private async indexSingleDocument(documentRef: string, rawText: string): Promise<number> {
    const ref = documentRef.trim();
    if (!ref) {
      throw new IngestionError("Document reference must not be empty.", documentRef);
    }

    const spans = splitIntoChunks(
      rawText,
      this.deps.settings.chunkSize,
      this.deps.settings.chunkOverlap,
    );
    if (spans.length === 0) {
      throw new IngestionError(`Document "${ref}" has no text to index.`, ref);
    }

    const vectors = await this.deps.embedder.embedTexts(spans.map((span) => span.text));
    if (vectors.length !== spans.length) {
      throw new EmbeddingUnavailableError(
        `Embedding count mismatch: ${vectors.length} vectors for ${spans.length} chunks.`,
      );
    }

    const records = await this.deps.index.replaceDocument(
      ref,
      spans.map((span, position) => ({ ...span, vector: vectors[position] })),
    );
    this.logger.info("document indexed", { document: ref, chunks: records.length });
    return records.length;
  }

  private async persistIfChanged(result: IndexDocumentsResult): Promise<void> {
    if (result.indexed_count > 0) {
      await this.persistIndex();
    }
  }

  private async persistIndex(): Promise<void> {
    const indexPath = this.deps.settings.indexPath;
    if (indexPath) {
      await this.deps.index.persist(indexPath);
    }
  }
}

function requireSelection(selectedText: string): string {
  const selected = selectedText.trim();
  if (!selected) {
    throw new Error("Selected text must not be empty.");
  }
  return selected;
}

function attributions(results: SearchResult[]): string[] {
  return [...new Set(results.map((result) => result.attribution))];
}

function normalizeSourceName(source: string, position: number): string {
  const trimmed = source.trim();
  if (!trimmed) {
    return `uploaded-${position + 1}.txt`;
  }
  return trimmed.replace(/[\\/:*?"<>|]/g, "_");
}
