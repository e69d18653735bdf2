import { ChunkRecord, DocumentRecord, IndexHit } from "./types.js";

export interface ChunkInput {
  index: number;
  text: string;
  startOffset: number;
  endOffset: number;
  vector: number[];
}

export interface IndexStats {
  dimension: number;
  documentCount: number;
  chunkCount: number;
}

/**
 * Nearest-neighbour store over chunk embeddings.
 *
 * Callers only depend on this interface, so an approximate backend can replace
 * the exact linear scan without touching retrieval code.
 */
export interface VectorIndex {
  readonly dimension: number;
  size(): number;
  nextChunkId(): number;
  add(chunk: ChunkRecord, vector: number[]): Promise<void>;
  remove(chunkId: number): Promise<boolean>;
  replaceDocument(documentRef: string, chunks: ChunkInput[]): Promise<ChunkRecord[]>;
  removeDocument(documentRef: string): Promise<number>;
  search(queryVector: number[], k: number): Promise<IndexHit[]>;
  getChunk(chunkId: number): ChunkRecord | undefined;
  listDocuments(): DocumentRecord[];
  stats(): IndexStats;
  clear(): Promise<void>;
  persist(filePath: string): Promise<void>;
  /** Resolves false when nothing is stored at `filePath`. */
  load(filePath: string): Promise<boolean>;
}
