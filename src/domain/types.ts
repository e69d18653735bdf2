export type ResultSource = "local" | "online";

export interface DocumentRecord {
  ref: string;
  indexedAt: string;
  chunkCount: number;
}

export interface ChunkRecord {
  id: number;
  documentRef: string;
  index: number;
  text: string;
  startOffset: number;
  endOffset: number;
}

export interface IndexHit {
  chunk: ChunkRecord;
  score: number;
}

export interface SearchResult {
  chunkId: number | null;
  score: number;
  source: ResultSource;
  text: string;
  attribution: string;
}

export interface CacheEntry {
  queryKey: string;
  results: SearchResult[];
  fetchedAt: number;
  ttlMs: number;
}

export interface OnlineSearchHit {
  text: string;
  score: number;
  attribution: string;
}

export type SuggestionOrigin = "generated" | "template";

export interface Suggestion {
  text: string;
  origin: SuggestionOrigin;
  sources: string[];
}
