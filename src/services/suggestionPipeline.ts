import { describeError, PipelineCancelledError } from "../domain/errors.js";
import { SearchResult, Suggestion } from "../domain/types.js";
import { EmbeddingGateway, GenerationGateway } from "../infra/ai/types.js";
import {
  buildSuggestionPrompt,
  buildTemplateSuggestions,
  cleanGeneratedSuggestion,
  extractQueryText,
  trailingContext,
} from "../pipelines/suggestions.js";
import { withTimeout } from "../utils/async.js";
import { Logger, silentLogger } from "../utils/logger.js";
import { BoundedTaskQueue } from "../utils/taskQueue.js";
import { RetrievalOrchestrator, RetrievalOutcome } from "./retrievalOrchestrator.js";

export type SuggestionStage =
  | "idle"
  | "debouncing"
  | "retrieving"
  | "generating"
  | "completed"
  | "cancelled"
  | "failed";

export interface SuggestionInput {
  contextText: string;
  cursorPosition: number;
}

export type SuggestionOutcome =
  | {
      status: "completed";
      requestId: number;
      suggestions: Suggestion[];
      retrieval: RetrievalOutcome;
    }
  | { status: "failed"; requestId: number; error: Error }
  | { status: "cancelled"; requestId: number }
  | { status: "skipped"; requestId: number; reason: "below_trigger" };

export interface SuggestionHandle {
  requestId: number;
  settled: Promise<SuggestionOutcome>;
}

export interface SuggestionDelivery {
  requestId: number;
  suggestions: Suggestion[];
  retrieval: RetrievalOutcome;
}

export interface SuggestionFailure {
  requestId: number;
  error: Error;
}

export interface SuggestionCallbacks {
  onSuggestions?: (delivery: SuggestionDelivery) => void;
  onError?: (failure: SuggestionFailure) => void;
}

/** Schedules `callback` after `delayMs` and returns a function that cancels it. */
export interface Scheduler {
  schedule(callback: () => void, delayMs: number): () => void;
}

export const timerScheduler: Scheduler = {
  schedule(callback, delayMs) {
    const timer = setTimeout(callback, delayMs);
    return () => clearTimeout(timer);
  },
};

export interface SuggestionPipelineSettings {
  debounceMs: number;
  minTriggerChars: number;
  contextWindowChars: number;
  maxContextChars: number;
  variantCount: number;
  maxSuggestionChars: number;
  /** A generation slower than this counts as failed and templates are used. */
  generationTimeoutMs: number;
}

export interface SuggestionPipelineDeps {
  embedder: EmbeddingGateway;
  orchestrator: RetrievalOrchestrator;
  generator: GenerationGateway | null;
  settings: SuggestionPipelineSettings;
  callbacks?: SuggestionCallbacks;
  /** Worker that runs retrieval and generation; defaults to concurrency 1. */
  queue?: BoundedTaskQueue;
  scheduler?: Scheduler;
  nextRequestId?: () => number;
  logger?: Logger;
}

interface SuggestionRequest {
  id: number;
  contextText: string;
  cursorPosition: number;
  cancelled: boolean;
  stage: SuggestionStage;
  cancelTimer: (() => void) | null;
  settle: (outcome: SuggestionOutcome) => void;
}

const RETAINED_REQUESTS = 64;
const TERMINAL_STAGES = new Set<SuggestionStage>(["completed", "cancelled", "failed", "idle"]);

/**
 * Per-session suggestion state machine.
 *
 * Every submit supersedes the active request. Cancellation is cooperative: the
 * flag is checked between stages, and a result that arrives after its request
 * stopped being the latest is dropped instead of delivered.
 */
export class SuggestionPipeline {
  private readonly requests = new Map<number, SuggestionRequest>();

  private active: SuggestionRequest | null = null;

  private latestRequestId = 0;

  private localRequestCounter = 0;

  private disposed = false;

  private readonly queue: BoundedTaskQueue;

  private readonly scheduler: Scheduler;

  private readonly logger: Logger;

  constructor(private readonly deps: SuggestionPipelineDeps) {
    this.queue = deps.queue ?? new BoundedTaskQueue(1);
    this.scheduler = deps.scheduler ?? timerScheduler;
    this.logger = deps.logger ?? silentLogger;
  }

  get stage(): SuggestionStage {
    return this.active?.stage ?? "idle";
  }

  get latestId(): number {
    return this.latestRequestId;
  }

  getStage(requestId: number): SuggestionStage | undefined {
    return this.requests.get(requestId)?.stage;
  }

  submit(input: SuggestionInput): SuggestionHandle {
    if (this.disposed) {
      throw new Error("Suggestion pipeline has been disposed.");
    }

    if (this.active) {
      this.cancelRequest(this.active, "superseded");
    }

    const id = this.allocateRequestId();
    let settle: (outcome: SuggestionOutcome) => void = () => {};
    const settled = new Promise<SuggestionOutcome>((resolve) => {
      let done = false;
      settle = (outcome) => {
        if (!done) {
          done = true;
          resolve(outcome);
        }
      };
    });

    const request: SuggestionRequest = {
      id,
      contextText: input.contextText,
      cursorPosition: input.cursorPosition,
      cancelled: false,
      stage: "debouncing",
      cancelTimer: null,
      settle,
    };

    this.requests.set(id, request);
    this.pruneRequests();
    this.active = request;
    this.latestRequestId = id;
    request.cancelTimer = this.scheduler.schedule(
      () => this.onDebounceElapsed(request),
      this.deps.settings.debounceMs,
    );

    return { requestId: id, settled };
  }

  cancel(requestId: number): boolean {
    const request = this.requests.get(requestId);
    if (!request) {
      return false;
    }
    return this.cancelRequest(request, "cancelled by caller");
  }

  dispose(): void {
    if (this.active) {
      this.cancelRequest(this.active, "pipeline disposed");
    }
    this.disposed = true;
  }

  private allocateRequestId(): number {
    if (this.deps.nextRequestId) {
      return this.deps.nextRequestId();
    }
    this.localRequestCounter += 1;
    return this.localRequestCounter;
  }

  private cancelRequest(request: SuggestionRequest, reason: string): boolean {
    if (request.cancelled || TERMINAL_STAGES.has(request.stage)) {
      return false;
    }

    request.cancelled = true;
    request.cancelTimer?.();
    request.cancelTimer = null;
    this.logger.debug("suggestion request cancelled", {
      request_id: request.id,
      stage: request.stage,
      reason,
    });
    request.stage = "cancelled";
    this.release(request);
    request.settle({ status: "cancelled", requestId: request.id });
    return true;
  }

  private onDebounceElapsed(request: SuggestionRequest): void {
    request.cancelTimer = null;
    if (request.cancelled) {
      return;
    }

    const { contextWindowChars, minTriggerChars } = this.deps.settings;
    const queryText = extractQueryText(request.contextText, request.cursorPosition, contextWindowChars);
    if (queryText.length < minTriggerChars) {
      request.stage = "idle";
      this.release(request);
      request.settle({ status: "skipped", requestId: request.id, reason: "below_trigger" });
      return;
    }

    request.stage = "retrieving";
    this.queue
      .run(() => this.execute(request, queryText))
      .catch((error: unknown) => {
        this.logger.error("suggestion worker crashed", {
          request_id: request.id,
          reason: describeError(error),
        });
      });
  }

  private async execute(request: SuggestionRequest, queryText: string): Promise<void> {
    try {
      this.checkpoint(request);
      const queryVector = await this.deps.embedder.embedQuery(queryText);
      this.checkpoint(request);

      const retrieval = await this.deps.orchestrator.retrieve({ queryText, queryVector });
      this.checkpoint(request);

      request.stage = "generating";
      const userText = trailingContext(
        request.contextText,
        request.cursorPosition,
        this.deps.settings.contextWindowChars,
      ).trim();
      const suggestions = await this.generate(request, userText, retrieval.results);
      this.checkpoint(request);

      this.complete(request, suggestions, retrieval);
    } catch (error) {
      if (error instanceof PipelineCancelledError) {
        this.logger.debug("suggestion request stopped at stage boundary", {
          request_id: request.id,
        });
        return;
      }
      this.fail(request, error);
    }
  }

  private async generate(
    request: SuggestionRequest,
    userText: string,
    results: SearchResult[],
  ): Promise<Suggestion[]> {
    const { variantCount, maxContextChars, maxSuggestionChars, generationTimeoutMs } =
      this.deps.settings;
    const generator = this.deps.generator;
    const suggestions: Suggestion[] = [];

    if (generator && generator.isAvailable()) {
      try {
        const prompt = buildSuggestionPrompt(userText, results, maxContextChars);
        const raw = await withTimeout(
          (signal) => generator.generate(prompt, variantCount, signal),
          generationTimeoutMs,
        );
        this.checkpoint(request);

        const sources = [...new Set(results.map((result) => result.attribution))];
        for (const candidate of raw) {
          const text = cleanGeneratedSuggestion(candidate, userText, maxSuggestionChars);
          if (text && !suggestions.some((existing) => existing.text === text)) {
            suggestions.push({ text, origin: "generated", sources });
          }
        }
      } catch (error) {
        if (error instanceof PipelineCancelledError) {
          throw error;
        }
        this.logger.warn("generation failed; using template suggestions", {
          request_id: request.id,
          reason: describeError(error),
        });
      }
    }

    if (suggestions.length < variantCount) {
      for (const template of buildTemplateSuggestions(results, userText, variantCount)) {
        if (suggestions.length >= variantCount) {
          break;
        }
        if (!suggestions.some((existing) => existing.text === template.text)) {
          suggestions.push(template);
        }
      }
    }

    return suggestions.slice(0, variantCount);
  }

  private complete(
    request: SuggestionRequest,
    suggestions: Suggestion[],
    retrieval: RetrievalOutcome,
  ): void {
    if (!this.isDeliverable(request)) {
      this.discard(request);
      return;
    }

    request.stage = "completed";
    this.release(request);
    request.settle({ status: "completed", requestId: request.id, suggestions, retrieval });
    this.invokeCallback("onSuggestions", () =>
      this.deps.callbacks?.onSuggestions?.({ requestId: request.id, suggestions, retrieval }),
    );
  }

  private fail(request: SuggestionRequest, cause: unknown): void {
    if (!this.isDeliverable(request)) {
      this.discard(request);
      return;
    }

    const error = cause instanceof Error ? cause : new Error(describeError(cause));
    this.logger.warn("suggestion request failed", {
      request_id: request.id,
      reason: error.message,
    });
    request.stage = "failed";
    this.release(request);
    request.settle({ status: "failed", requestId: request.id, error });
    this.invokeCallback("onError", () =>
      this.deps.callbacks?.onError?.({ requestId: request.id, error }),
    );
  }

  private isDeliverable(request: SuggestionRequest): boolean {
    return !request.cancelled && request.id === this.latestRequestId;
  }

  private discard(request: SuggestionRequest): void {
    this.logger.debug("discarding stale suggestion result", { request_id: request.id });
    if (!request.cancelled) {
      request.cancelled = true;
      request.stage = "cancelled";
      this.release(request);
    }
    request.settle({ status: "cancelled", requestId: request.id });
  }

  private checkpoint(request: SuggestionRequest): void {
    if (request.cancelled) {
      throw new PipelineCancelledError(request.id);
    }
  }

  private release(request: SuggestionRequest): void {
    if (this.active === request) {
      this.active = null;
    }
  }

  private invokeCallback(name: keyof SuggestionCallbacks, invoke: () => void): void {
    try {
      invoke();
    } catch (error) {
      this.logger.error(`suggestion ${name} callback threw`, { reason: describeError(error) });
    }
  }

  private pruneRequests(): void {
    for (const [id, request] of this.requests) {
      if (this.requests.size <= RETAINED_REQUESTS) {
        return;
      }
      if (TERMINAL_STAGES.has(request.stage)) {
        this.requests.delete(id);
      }
    }
  }
}
