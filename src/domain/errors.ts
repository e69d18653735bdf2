export class SuggestEngineError extends Error {
  constructor(
    message: string,
    public readonly code: string,
  ) {
    super(message);
    this.name = "SuggestEngineError";
  }
}

export class IngestionError extends SuggestEngineError {
  constructor(
    message: string,
    public readonly documentRef: string,
  ) {
    super(message, "INGESTION_ERROR");
    this.name = "IngestionError";
  }
}

export class DimensionMismatchError extends SuggestEngineError {
  constructor(
    public readonly expected: number,
    public readonly actual: number,
  ) {
    super(
      `Vector dimension mismatch: expected ${expected}, received ${actual}.`,
      "DIMENSION_MISMATCH",
    );
    this.name = "DimensionMismatchError";
  }
}

/** The persisted index failed its integrity check; callers rebuild from documents. */
export class CorruptIndexError extends SuggestEngineError {
  constructor(message: string) {
    super(message, "CORRUPT_INDEX");
    this.name = "CorruptIndexError";
  }
}

export class EmbeddingUnavailableError extends SuggestEngineError {
  constructor(message: string) {
    super(message, "EMBEDDING_UNAVAILABLE");
    this.name = "EmbeddingUnavailableError";
  }
}

export class OnlineFallbackError extends SuggestEngineError {
  constructor(message: string) {
    super(message, "ONLINE_FALLBACK_FAILURE");
    this.name = "OnlineFallbackError";
  }
}

/** A malformed or oversized HTTP request; `status` is the response code to send. */
export class RequestRejectedError extends SuggestEngineError {
  constructor(
    message: string,
    public readonly status: number,
  ) {
    super(message, "REQUEST_REJECTED");
    this.name = "RequestRejectedError";
  }
}

export class CacheCorruptionError extends SuggestEngineError {
  constructor(message: string) {
    super(message, "CACHE_CORRUPTION");
    this.name = "CacheCorruptionError";
  }
}

export class PipelineCancelledError extends SuggestEngineError {
  constructor(public readonly requestId: number) {
    super(`Suggestion request ${requestId} was cancelled.`, "PIPELINE_CANCELLED");
    this.name = "PipelineCancelledError";
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : "unknown error";
}
