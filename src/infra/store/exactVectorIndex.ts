import path from "node:path";
import { DimensionMismatchError } from "../../domain/errors.js";
import { ChunkRecord, DocumentRecord, IndexHit } from "../../domain/types.js";
import { ChunkInput, IndexStats, VectorIndex } from "../../domain/vectorIndex.js";
import { readFileIfExists, writeFileAtomic } from "../../utils/files.js";
import { Mutex, ReadWriteLock } from "../../utils/locks.js";
import { Logger, silentLogger } from "../../utils/logger.js";
import { clampScore, dotProduct, normalizeVector } from "../../utils/vector.js";
import { decodeIndexSnapshot, encodeIndexSnapshot, IndexSnapshot } from "./indexSnapshot.js";

interface StoredEntry {
  chunk: ChunkRecord;
  vector: number[];
}

export interface ExactVectorIndexOptions {
  dimension: number;
  logger?: Logger;
}

/**
 * Exact cosine search by linear scan. Vectors are normalized on insert so a
 * search is one dot product per entry.
 */
export class ExactVectorIndex implements VectorIndex {
  readonly dimension: number;

  private readonly entries = new Map<number, StoredEntry>();

  private readonly documents = new Map<string, DocumentRecord>();

  private readonly chunkIdsByDocument = new Map<string, Set<number>>();

  private nextId = 0;

  private readonly lock = new ReadWriteLock();

  private readonly persistMutex = new Mutex();

  private readonly logger: Logger;

  constructor(options: ExactVectorIndexOptions) {
    if (!Number.isInteger(options.dimension) || options.dimension < 1) {
      throw new RangeError(`Index dimension must be a positive integer, got ${options.dimension}.`);
    }
    this.dimension = options.dimension;
    this.logger = options.logger ?? silentLogger;
  }

  size(): number {
    return this.entries.size;
  }

  nextChunkId(): number {
    return this.nextId;
  }

  async add(chunk: ChunkRecord, vector: number[]): Promise<void> {
    this.assertDimension(vector);
    const normalized = normalizeVector(vector);

    await this.lock.withWrite(() => {
      const existing = this.entries.get(chunk.id);
      if (existing) {
        this.detachChunk(existing.chunk);
      }
      this.entries.set(chunk.id, { chunk: { ...chunk }, vector: normalized });
      this.attachChunk(chunk);
      this.nextId = Math.max(this.nextId, chunk.id + 1);
    });
  }

  async remove(chunkId: number): Promise<boolean> {
    return this.lock.withWrite(() => this.removeUnlocked(chunkId));
  }

  async replaceDocument(documentRef: string, chunks: ChunkInput[]): Promise<ChunkRecord[]> {
    for (const input of chunks) {
      this.assertDimension(input.vector);
    }
    const normalized = chunks.map((input) => normalizeVector(input.vector));

    return this.lock.withWrite(() => {
      this.removeDocumentUnlocked(documentRef);
      if (chunks.length === 0) {
        return [];
      }

      const records: ChunkRecord[] = chunks.map((input, position) => {
        const record: ChunkRecord = {
          id: this.nextId,
          documentRef,
          index: input.index,
          text: input.text,
          startOffset: input.startOffset,
          endOffset: input.endOffset,
        };
        this.nextId += 1;
        this.entries.set(record.id, { chunk: record, vector: normalized[position] });
        return record;
      });

      this.chunkIdsByDocument.set(documentRef, new Set(records.map((record) => record.id)));
      this.documents.set(documentRef, {
        ref: documentRef,
        indexedAt: new Date().toISOString(),
        chunkCount: records.length,
      });

      return records.map((record) => ({ ...record }));
    });
  }

  async removeDocument(documentRef: string): Promise<number> {
    return this.lock.withWrite(() => this.removeDocumentUnlocked(documentRef));
  }

  async search(queryVector: number[], k: number): Promise<IndexHit[]> {
    this.assertDimension(queryVector);
    if (k <= 0) {
      return [];
    }
    const query = normalizeVector(queryVector);

    return this.lock.withRead(() => {
      const scored: IndexHit[] = [];
      for (const entry of this.entries.values()) {
        scored.push({ chunk: entry.chunk, score: clampScore(dotProduct(query, entry.vector)) });
      }

      return scored
        .sort((a, b) => b.score - a.score || a.chunk.id - b.chunk.id)
        .slice(0, Math.floor(k))
        .map((hit) => ({ chunk: { ...hit.chunk }, score: hit.score }));
    });
  }

  getChunk(chunkId: number): ChunkRecord | undefined {
    const entry = this.entries.get(chunkId);
    return entry ? { ...entry.chunk } : undefined;
  }

  listDocuments(): DocumentRecord[] {
    return [...this.documents.values()]
      .map((document) => ({ ...document }))
      .sort((a, b) => a.ref.localeCompare(b.ref));
  }

  stats(): IndexStats {
    return {
      dimension: this.dimension,
      documentCount: this.documents.size,
      chunkCount: this.entries.size,
    };
  }

  async clear(): Promise<void> {
    await this.lock.withWrite(() => {
      this.entries.clear();
      this.documents.clear();
      this.chunkIdsByDocument.clear();
      this.nextId = 0;
    });
  }

  async persist(filePath: string): Promise<void> {
    await this.persistMutex.runExclusive(async () => {
      const serialized = await this.lock.withRead(() => encodeIndexSnapshot(this.exportSnapshot()));
      await writeFileAtomic(filePath, serialized);
      this.logger.debug("index persisted", {
        path: path.resolve(filePath),
        chunks: this.entries.size,
      });
    });
  }

  async load(filePath: string): Promise<boolean> {
    const raw = await readFileIfExists(filePath);
    if (raw === null) {
      return false;
    }

    const snapshot = decodeIndexSnapshot(raw, this.dimension);
    await this.lock.withWrite(() => {
      this.importSnapshot(snapshot);
    });
    this.logger.info("index loaded", {
      path: path.resolve(filePath),
      documents: this.documents.size,
      chunks: this.entries.size,
    });
    return true;
  }

  private exportSnapshot(): IndexSnapshot {
    const entries = [...this.entries.values()]
      .sort((a, b) => a.chunk.id - b.chunk.id)
      .map((entry) => ({ chunk: { ...entry.chunk }, vector: [...entry.vector] }));

    return {
      dimension: this.dimension,
      nextChunkId: this.nextId,
      documents: this.listDocuments(),
      entries,
    };
  }

  private importSnapshot(snapshot: IndexSnapshot): void {
    this.entries.clear();
    this.documents.clear();
    this.chunkIdsByDocument.clear();

    for (const document of snapshot.documents) {
      this.documents.set(document.ref, { ...document });
    }
    // Stored vectors are already unit length; keep them bit-for-bit.
    for (const entry of snapshot.entries) {
      this.entries.set(entry.chunk.id, { chunk: { ...entry.chunk }, vector: [...entry.vector] });
      this.chunkIdSet(entry.chunk.documentRef).add(entry.chunk.id);
    }
    this.nextId = snapshot.nextChunkId;
  }

  private removeUnlocked(chunkId: number): boolean {
    const existing = this.entries.get(chunkId);
    if (!existing) {
      return false;
    }
    this.entries.delete(chunkId);
    this.detachChunk(existing.chunk);
    return true;
  }

  private removeDocumentUnlocked(documentRef: string): number {
    const ids = this.chunkIdsByDocument.get(documentRef);
    let removed = 0;
    for (const id of ids ?? []) {
      if (this.entries.delete(id)) {
        removed += 1;
      }
    }
    this.chunkIdsByDocument.delete(documentRef);
    this.documents.delete(documentRef);
    return removed;
  }

  private attachChunk(chunk: ChunkRecord): void {
    const ids = this.chunkIdSet(chunk.documentRef);
    ids.add(chunk.id);
    this.documents.set(chunk.documentRef, {
      ref: chunk.documentRef,
      indexedAt: new Date().toISOString(),
      chunkCount: ids.size,
    });
  }

  private detachChunk(chunk: ChunkRecord): void {
    const ids = this.chunkIdsByDocument.get(chunk.documentRef);
    if (!ids) {
      return;
    }
    ids.delete(chunk.id);
    if (ids.size === 0) {
      this.chunkIdsByDocument.delete(chunk.documentRef);
      this.documents.delete(chunk.documentRef);
      return;
    }
    const document = this.documents.get(chunk.documentRef);
    if (document) {
      document.chunkCount = ids.size;
    }
  }

  private chunkIdSet(documentRef: string): Set<number> {
    let ids = this.chunkIdsByDocument.get(documentRef);
    if (!ids) {
      ids = new Set<number>();
      this.chunkIdsByDocument.set(documentRef, ids);
    }
    return ids;
  }

  private assertDimension(vector: number[]): void {
    if (vector.length !== this.dimension) {
      throw new DimensionMismatchError(this.dimension, vector.length);
    }
  }
}
