import { RetrievalOutcome } from "../services/retrievalOrchestrator.js";
import { SuggestionOutcome } from "../services/suggestionPipeline.js";
import { TextRewrite } from "../services/suggestionService.js";

export function jsonResult(payload: unknown) {
  return {
    content: [
      {
        type: "text" as const,
        text: JSON.stringify(payload, null, 2),
      },
    ],
  };
}

export function formatRetrieval(outcome: RetrievalOutcome) {
  return {
    query: outcome.query,
    fallback_triggered: outcome.fallbackTriggered,
    cache_hit: outcome.cacheHit,
    online_error: outcome.onlineError,
    top_local_score:
      outcome.topLocalScore === null ? null : Number(outcome.topLocalScore.toFixed(4)),
    results: outcome.results.map((result) => ({
      source: result.source,
      score: Number(result.score.toFixed(4)),
      chunk_id: result.chunkId,
      attribution: result.attribution,
      snippet: result.text.slice(0, 240),
    })),
  };
}

export function formatSuggestionOutcome(outcome: SuggestionOutcome) {
  switch (outcome.status) {
    case "completed":
      return {
        request_id: outcome.requestId,
        status: outcome.status,
        suggestions: outcome.suggestions,
        retrieval: formatRetrieval(outcome.retrieval),
      };
    case "failed":
      return {
        request_id: outcome.requestId,
        status: outcome.status,
        error: outcome.error.message,
      };
    case "skipped":
      return {
        request_id: outcome.requestId,
        status: outcome.status,
        reason: outcome.reason,
      };
    case "cancelled":
      return { request_id: outcome.requestId, status: outcome.status };
  }
}

export function formatRewrite(rewrite: TextRewrite) {
  return {
    text: rewrite.text,
    origin: rewrite.origin,
    sources: rewrite.sources,
    retrieval: formatRetrieval(rewrite.retrieval),
  };
}
