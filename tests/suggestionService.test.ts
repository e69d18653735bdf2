import { promises as fs } from "node:fs";
import path from "node:path";
import { afterEach, describe, expect, it, vi } from "vitest";
import { EmbeddingUnavailableError } from "../src/domain/errors.js";
import { HashingEmbeddingClient } from "../src/infra/ai/hashingEmbeddingClient.js";
import { EmbeddingGateway, GenerationGateway } from "../src/infra/ai/types.js";
import { ResultCache } from "../src/infra/cache/resultCache.js";
import { ExactVectorIndex } from "../src/infra/store/exactVectorIndex.js";
import { RetrievalOrchestrator } from "../src/services/retrievalOrchestrator.js";
import { SuggestionEvent, SuggestionService } from "../src/services/suggestionService.js";

const TEMP_DIR = path.resolve(".tmp-tests-service");
const DOCS_DIR = path.join(TEMP_DIR, "docs");
const INDEX_FILE = path.join(TEMP_DIR, "vector-index.json");
const DIMENSION = 256;

interface ServiceOptions {
  embedder?: EmbeddingGateway;
  documentsDir?: string | null;
  indexPath?: string | null;
  generator?: GenerationGateway | null;
  generationTimeoutMs?: number;
}

const REFERENCE_DOCUMENTS = [
  { source: "solar.txt", content: "Photovoltaic panels turn sunlight into power. They need little upkeep." },
  { source: "storage.txt", content: "Battery storage keeps solar power for the night. Costs keep falling." },
];

function stalledGenerator() {
  const generate = vi.fn(
    (_prompt: string, _variantCount: number, _signal?: AbortSignal) => new Promise<string[]>(() => {}),
  );
  const generator: GenerationGateway = { isAvailable: () => true, generate };
  return { generator, generate };
}

function createService(options: ServiceOptions = {}) {
  const index = new ExactVectorIndex({ dimension: DIMENSION });
  const embedder = options.embedder ?? new HashingEmbeddingClient(DIMENSION);
  const cache = new ResultCache({ filePath: null, ttlMs: 60_000, maxEntries: 8 });
  const orchestrator = new RetrievalOrchestrator({
    index,
    cache,
    onlineSearch: null,
    settings: {
      similarityThreshold: 0.3,
      topK: 5,
      onlineSearchEnabled: false,
      maxOnlineResults: 3,
      onlineTimeoutMs: 1_000,
      retainWeakLocalResults: false,
    },
  });

  const service = new SuggestionService({
    index,
    embedder,
    generator: options.generator ?? null,
    orchestrator,
    cache,
    settings: {
      chunkSize: 512,
      chunkOverlap: 50,
      indexPath: options.indexPath === undefined ? null : options.indexPath,
      documentsDir: options.documentsDir ?? null,
      workerConcurrency: 1,
      pipeline: {
        debounceMs: 500,
        minTriggerChars: 3,
        contextWindowChars: 100,
        maxContextChars: 1_500,
        variantCount: 3,
        maxSuggestionChars: 400,
        generationTimeoutMs: options.generationTimeoutMs ?? 5_000,
      },
    },
  });

  return { service, index };
}

describe("SuggestionService", () => {
  afterEach(async () => {
    vi.useRealTimers();
    await fs.rm(TEMP_DIR, { recursive: true, force: true });
  });

  it("indexes a document and replaces it on re-index", async () => {
    const { service } = createService();

    expect(await service.indexDocument("notes/solar.md", "Solar panels convert sunlight.")).toBe(1);
    expect(await service.indexDocument("notes/solar.md", "Wind turbines spin.")).toBe(1);

    expect(service.listSources().map((source) => [source.ref, source.chunkCount])).toEqual([
      ["notes/solar.md", 1],
    ]);
    expect(await service.getIndexStats()).toEqual({
      dimension: DIMENSION,
      documentCount: 1,
      chunkCount: 1,
      cacheEntries: 0,
      sessions: 0,
    });
  });

  it("collects per-document failures and keeps indexing the batch", async () => {
    const { service } = createService();

    const result = await service.indexRawDocuments([
      { source: "solar.txt", content: "Solar panels convert sunlight." },
      { source: "empty.txt", content: "   " },
      { source: "", content: "Anonymous note." },
    ]);

    expect(result).toEqual({
      indexed_count: 2,
      chunk_count: 2,
      failed: [{ path: "empty.txt", reason: 'Document "upload://empty.txt" has no text to index.' }],
    });
    expect(service.listSources().map((source) => source.ref)).toEqual([
      "upload://solar.txt",
      "upload://uploaded-3.txt",
    ]);
  });

  it("indexes files from disk and persists the index", async () => {
    await fs.mkdir(DOCS_DIR, { recursive: true });
    const notePath = path.join(DOCS_DIR, "note.md");
    await fs.writeFile(notePath, "# Energy\n\nSolar panels convert sunlight.", "utf-8");
    const { service } = createService({ indexPath: INDEX_FILE });

    const result = await service.indexDocuments([
      notePath,
      path.join(DOCS_DIR, "missing.md"),
      path.join(DOCS_DIR, "manual.pdf"),
    ]);

    expect(result.indexed_count).toBe(1);
    expect(result.failed.map((failure) => failure.path)).toEqual([
      path.join(DOCS_DIR, "missing.md"),
      path.join(DOCS_DIR, "manual.pdf"),
    ]);
    expect(result.failed[1].reason).toBe("Unsupported extension: .pdf. Allowed: .md, .txt");

    const restored = new ExactVectorIndex({ dimension: DIMENSION });
    expect(await restored.load(INDEX_FILE)).toBe(true);
    expect(restored.listDocuments().map((document) => document.ref)).toEqual([notePath]);
  });

  it("aborts the batch when embeddings are unavailable", async () => {
    const embedder: EmbeddingGateway = {
      isConfigured: () => true,
      embedTexts: async () => {
        throw new EmbeddingUnavailableError("embedding service offline");
      },
      embedQuery: async () => {
        throw new EmbeddingUnavailableError("embedding service offline");
      },
    };
    const { service } = createService({ embedder });

    await expect(
      service.indexRawDocuments([
        { source: "a.txt", content: "First." },
        { source: "b.txt", content: "Second." },
      ]),
    ).rejects.toBeInstanceOf(EmbeddingUnavailableError);
    expect(service.listSources()).toEqual([]);
  });

  it("removes documents", async () => {
    const { service } = createService();
    await service.indexDocument("notes/solar.md", "Solar panels convert sunlight.");

    expect(await service.removeDocument("notes/solar.md")).toBe(1);
    expect(await service.removeDocument("notes/solar.md")).toBe(0);
    expect(service.listSources()).toEqual([]);
  });

  it("retrieves local context for a similar query", async () => {
    const { service } = createService();
    await service.indexRawDocuments([
      { source: "solar.txt", content: "Solar panels convert sunlight." },
      { source: "fruit.txt", content: "Bananas are yellow fruit." },
    ]);

    const outcome = await service.retrieveContext("solar panels");

    expect(outcome.fallbackTriggered).toBe(false);
    expect(outcome.results[0].attribution).toBe("upload://solar.txt#0");
  });

  it("delivers suggestions to subscribers per session", async () => {
    vi.useFakeTimers();
    const { service } = createService();
    await service.indexRawDocuments([
      { source: "solar.txt", content: "Solar panels convert sunlight. They last for decades." },
    ]);
    const events: SuggestionEvent[] = [];
    const unsubscribe = service.subscribe((event) => events.push(event));

    const first = service.querySuggestions("Solar panels", 12, "editor-a");
    const second = service.querySuggestions("Solar panels", 12, "editor-b");
    await vi.advanceTimersByTimeAsync(500);
    await vi.waitFor(() => expect(events).toHaveLength(2));

    expect(second).toBe(first + 1);
    const bySession = new Map(events.map((event) => [event.sessionId, event]));
    const eventA = bySession.get("editor-a");
    expect(eventA?.requestId).toBe(first);
    expect(eventA?.type).toBe("suggestions");
    if (eventA?.type === "suggestions") {
      expect(eventA.suggestions.map((suggestion) => suggestion.text)).toEqual(["convert sunlight."]);
    }
    expect(bySession.get("editor-b")?.requestId).toBe(second);

    unsubscribe();
    const third = service.querySuggestions("Solar panels", 12, "editor-a");
    await vi.advanceTimersByTimeAsync(500);
    await vi.waitFor(() => expect(service.getRequestStage(third)).toBe("completed"));
    expect(events).toHaveLength(2);
  });

  it("cancels requests by their service-wide id", async () => {
    vi.useFakeTimers();
    const { service } = createService();
    const events: SuggestionEvent[] = [];
    service.subscribe((event) => events.push(event));

    const requestId = service.querySuggestions("Solar panels", 12, "editor-a");

    expect(service.cancel(requestId)).toBe(true);
    expect(service.cancel(requestId)).toBe(false);
    expect(service.cancel(requestId + 100)).toBe(false);
    expect(service.getRequestStage(requestId)).toBe("cancelled");

    await vi.advanceTimersByTimeAsync(1_000);
    expect(events).toEqual([]);
  });

  it("awaits the settled outcome in suggest", async () => {
    vi.useFakeTimers();
    const { service } = createService();
    await service.indexDocument("notes/solar.md", "Solar panels convert sunlight.");

    const pending = service.suggest("Solar panels", 12);
    await vi.advanceTimersByTimeAsync(500);
    const outcome = await pending;

    expect(outcome.status).toBe("completed");
    if (outcome.status === "completed") {
      expect(outcome.suggestions).toEqual([
        { text: "convert sunlight.", origin: "template", sources: ["notes/solar.md#0"] },
      ]);
    }
  });

  it("keeps serving one session while another session's generation stalls", async () => {
    vi.useFakeTimers();
    const hashing = new HashingEmbeddingClient(DIMENSION);
    const embedded: string[] = [];
    const embedder: EmbeddingGateway = {
      isConfigured: () => true,
      embedTexts: (texts) => hashing.embedTexts(texts),
      embedQuery: async (text) => {
        embedded.push(text);
        return hashing.embedQuery(text);
      },
    };
    const { generator, generate } = stalledGenerator();
    const { service } = createService({ embedder, generator });
    const events: SuggestionEvent[] = [];
    service.subscribe((event) => events.push(event));

    service.querySuggestions("Solar panels in A", 17, "editor-a");
    await vi.advanceTimersByTimeAsync(500);
    await vi.waitFor(() => expect(generate).toHaveBeenCalledTimes(1));
    service.querySuggestions("Wind turbines in B", 18, "editor-b");
    await vi.advanceTimersByTimeAsync(500);
    await vi.waitFor(() => expect(generate).toHaveBeenCalledTimes(2));

    expect(embedded).toEqual(["Solar panels in A", "Wind turbines in B"]);

    await vi.advanceTimersByTimeAsync(5_500);
    await vi.waitFor(() => expect(events).toHaveLength(2));
    expect(events.map((event) => [event.sessionId, event.type])).toEqual([
      ["editor-a", "suggestions"],
      ["editor-b", "suggestions"],
    ]);
  });

  it("resolves a submitted request's outcome by id", async () => {
    vi.useFakeTimers();
    const { service } = createService();
    await service.indexDocument("notes/solar.md", "Solar panels convert sunlight.");

    const requestId = service.querySuggestions("Solar panels", 12, "editor-a");
    const pending = service.waitForSuggestion(requestId);
    await vi.advanceTimersByTimeAsync(500);

    const outcome = await pending;
    expect(outcome?.status).toBe("completed");
    expect(outcome?.requestId).toBe(requestId);
    expect(service.waitForSuggestion(requestId + 1)).toBeUndefined();
  });

  it("refines a selection with the closest indexed sentence", async () => {
    const { service } = createService();
    await service.indexRawDocuments(REFERENCE_DOCUMENTS);

    const rewrite = await service.refineText("Solar panels turn sunlight into power");

    expect(rewrite.text).toBe("Photovoltaic panels turn sunlight into power.");
    expect(rewrite.origin).toBe("template");
    expect(rewrite.sources).toEqual(["upload://solar.txt#0"]);
    expect(rewrite.retrieval.fallbackTriggered).toBe(false);
  });

  it("cleans up the selection when nothing is indexed", async () => {
    const { service } = createService();

    const rewrite = await service.refineText("  solar   energy is  useful ");

    expect(rewrite).toMatchObject({ text: "solar energy is useful.", origin: "cleanup", sources: [] });
  });

  it("prefers generated rewrites and strips their quotes", async () => {
    const generate = vi.fn(
      async (_prompt: string, _variantCount: number, _signal?: AbortSignal) => [
        '"Photovoltaic cells convert light."',
      ],
    );
    const { service } = createService({ generator: { isAvailable: () => true, generate } });
    await service.indexRawDocuments(REFERENCE_DOCUMENTS);

    const rewrite = await service.refineText("Solar panels turn sunlight into power", "Intro. ");

    expect(rewrite.text).toBe("Photovoltaic cells convert light.");
    expect(rewrite.origin).toBe("generated");
    const [prompt, variantCount] = generate.mock.calls[0];
    expect(variantCount).toBe(1);
    expect(prompt).toContain("Surrounding text:\nIntro.\n");
    expect(prompt).toContain("Selected text:\nSolar panels turn sunlight into power\n");
  });

  it("falls back to retrieved text when a rewrite generation times out", async () => {
    vi.useFakeTimers();
    const { generator, generate } = stalledGenerator();
    const { service } = createService({ generator, generationTimeoutMs: 1_000 });
    await service.indexRawDocuments(REFERENCE_DOCUMENTS);

    const pending = service.refineText("Solar panels turn sunlight into power");
    await vi.waitFor(() => expect(generate).toHaveBeenCalledTimes(1));
    await vi.advanceTimersByTimeAsync(1_000);

    expect(await pending).toMatchObject({
      text: "Photovoltaic panels turn sunlight into power.",
      origin: "template",
    });
  });

  it("expands a selection with sentences from the top results", async () => {
    const { service } = createService();
    await service.indexRawDocuments(REFERENCE_DOCUMENTS);

    const rewrite = await service.expandText("Solar panels turn sunlight into power");

    expect(rewrite.text).toBe(
      "Solar panels turn sunlight into power. Photovoltaic panels turn sunlight into power. " +
        "Battery storage keeps solar power for the night.",
    );
    expect(rewrite.origin).toBe("template");
    expect(rewrite.sources).toEqual(["upload://solar.txt#0", "upload://storage.txt#0"]);
  });

  it("returns the selection unchanged when there is nothing to expand with", async () => {
    const { service } = createService();

    const rewrite = await service.expandText(" Solar panels ");

    expect(rewrite).toMatchObject({ text: "Solar panels", origin: "unchanged", sources: [] });
  });

  it("suggests alternative phrasings from indexed sentences", async () => {
    const { service } = createService();
    await service.indexRawDocuments(REFERENCE_DOCUMENTS);

    const result = await service.alternatives("Solar panels turn sunlight into power", 3);

    expect(result.alternatives).toEqual([
      {
        text: "Photovoltaic panels turn sunlight into power.",
        origin: "template",
        sources: ["upload://solar.txt#0"],
      },
      {
        text: "Battery storage keeps solar power for the night.",
        origin: "template",
        sources: ["upload://storage.txt#0"],
      },
    ]);
  });

  it("rejects a blank selection", async () => {
    const { service } = createService();

    await expect(service.refineText("   ")).rejects.toThrow("Selected text must not be empty.");
    await expect(service.alternatives("")).rejects.toThrow("Selected text must not be empty.");
  });

  it("rebuilds the index from the documents directory", async () => {
    await fs.mkdir(path.join(DOCS_DIR, "nested"), { recursive: true });
    await fs.writeFile(path.join(DOCS_DIR, "a.md"), "Solar panels convert sunlight.", "utf-8");
    await fs.writeFile(path.join(DOCS_DIR, "nested", "b.txt"), "Wind turbines spin.", "utf-8");
    await fs.writeFile(path.join(DOCS_DIR, "empty.txt"), "", "utf-8");
    const { service } = createService({ documentsDir: DOCS_DIR, indexPath: INDEX_FILE });
    await service.indexDocument("upload://stale.txt", "Old note.");

    const result = await service.rebuildIndex();

    expect(result.indexed_count).toBe(2);
    expect(result.failed.map((failure) => failure.path)).toEqual([path.join(DOCS_DIR, "empty.txt")]);
    expect(result.documents_dir).toBe(DOCS_DIR);
    expect(service.listSources().map((source) => source.ref)).toEqual([
      path.join(DOCS_DIR, "a.md"),
      path.join(DOCS_DIR, "nested", "b.txt"),
    ]);
  });

  it("persists on close and refuses new suggestions afterwards", async () => {
    const { service } = createService({ indexPath: INDEX_FILE });
    await service.indexDocument("notes/solar.md", "Solar panels convert sunlight.");
    await fs.rm(INDEX_FILE, { force: true });

    await service.close();

    await expect(fs.stat(INDEX_FILE)).resolves.toBeTruthy();
    expect(() => service.querySuggestions("Solar panels", 12)).toThrow("Suggestion service is closed.");
  });
});
