import { z } from "zod";
import { CorruptIndexError } from "../../domain/errors.js";
import { ChunkRecord, DocumentRecord } from "../../domain/types.js";

export const CURRENT_FORMAT_VERSION = 1;

const chunkSchema = z.object({
  id: z.number().int().nonnegative(),
  document_ref: z.string(),
  index: z.number().int().nonnegative(),
  text: z.string(),
  start_offset: z.number().int().nonnegative(),
  end_offset: z.number().int().nonnegative(),
});

const persistedIndexSchema = z.object({
  format_version: z.number().int(),
  saved_at: z.string(),
  dimension: z.number().int().positive(),
  next_chunk_id: z.number().int().nonnegative(),
  documents: z.array(
    z.object({
      ref: z.string(),
      indexed_at: z.string(),
      chunk_count: z.number().int().nonnegative(),
    }),
  ),
  chunks: z.array(chunkSchema),
  vectors: z.array(
    z.object({
      chunk_id: z.number().int().nonnegative(),
      vector: z.array(z.number()),
    }),
  ),
});

type PersistedIndex = z.infer<typeof persistedIndexSchema>;

export interface IndexSnapshotEntry {
  chunk: ChunkRecord;
  vector: number[];
}

export interface IndexSnapshot {
  dimension: number;
  nextChunkId: number;
  documents: DocumentRecord[];
  entries: IndexSnapshotEntry[];
}

export function encodeIndexSnapshot(snapshot: IndexSnapshot): string {
  const payload: PersistedIndex = {
    format_version: CURRENT_FORMAT_VERSION,
    saved_at: new Date().toISOString(),
    dimension: snapshot.dimension,
    next_chunk_id: snapshot.nextChunkId,
    documents: snapshot.documents.map((document) => ({
      ref: document.ref,
      indexed_at: document.indexedAt,
      chunk_count: document.chunkCount,
    })),
    chunks: snapshot.entries.map(({ chunk }) => ({
      id: chunk.id,
      document_ref: chunk.documentRef,
      index: chunk.index,
      text: chunk.text,
      start_offset: chunk.startOffset,
      end_offset: chunk.endOffset,
    })),
    vectors: snapshot.entries.map(({ chunk, vector }) => ({
      chunk_id: chunk.id,
      vector,
    })),
  };
  return JSON.stringify(payload);
}

/**
 * Parses and integrity-checks a persisted index. Every failure is a
 * CorruptIndexError so the caller can fall back to a full rebuild.
 */
export function decodeIndexSnapshot(raw: string, expectedDimension: number): IndexSnapshot {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    throw new CorruptIndexError("Index file is not valid JSON.");
  }

  const parsed = persistedIndexSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new CorruptIndexError(
      `Index file has an invalid layout at "${issue?.path.join(".") ?? ""}": ${issue?.message ?? "unknown issue"}.`,
    );
  }

  const data = parsed.data;
  if (data.format_version !== CURRENT_FORMAT_VERSION) {
    throw new CorruptIndexError(
      `Unsupported index format version: ${data.format_version}. Expected ${CURRENT_FORMAT_VERSION}.`,
    );
  }
  if (data.dimension !== expectedDimension) {
    throw new CorruptIndexError(
      `Stored index dimension ${data.dimension} does not match configured dimension ${expectedDimension}.`,
    );
  }
  if (data.vectors.length !== data.chunks.length) {
    throw new CorruptIndexError(
      `Index holds ${data.vectors.length} vectors but ${data.chunks.length} chunk records.`,
    );
  }

  const documentRefs = new Set(data.documents.map((document) => document.ref));
  const chunksById = new Map<number, ChunkRecord>();
  for (const row of data.chunks) {
    if (chunksById.has(row.id)) {
      throw new CorruptIndexError(`Duplicate chunk id ${row.id} in index file.`);
    }
    if (!documentRefs.has(row.document_ref)) {
      throw new CorruptIndexError(
        `Chunk ${row.id} references unknown document "${row.document_ref}".`,
      );
    }
    chunksById.set(row.id, {
      id: row.id,
      documentRef: row.document_ref,
      index: row.index,
      text: row.text,
      startOffset: row.start_offset,
      endOffset: row.end_offset,
    });
  }

  const entries: IndexSnapshotEntry[] = [];
  const seenVectors = new Set<number>();
  for (const row of data.vectors) {
    const chunk = chunksById.get(row.chunk_id);
    if (!chunk || seenVectors.has(row.chunk_id)) {
      throw new CorruptIndexError(`Vector for chunk ${row.chunk_id} has no matching chunk record.`);
    }
    if (row.vector.length !== data.dimension) {
      throw new CorruptIndexError(
        `Vector for chunk ${row.chunk_id} has length ${row.vector.length}, expected ${data.dimension}.`,
      );
    }
    seenVectors.add(row.chunk_id);
    entries.push({ chunk, vector: row.vector });
  }

  const maxChunkId = entries.reduce((max, entry) => Math.max(max, entry.chunk.id), -1);

  return {
    dimension: data.dimension,
    nextChunkId: Math.max(data.next_chunk_id, maxChunkId + 1),
    documents: data.documents.map((document) => ({
      ref: document.ref,
      indexedAt: document.indexed_at,
      chunkCount: document.chunk_count,
    })),
    entries,
  };
}
