const DEFAULT_MAX_CHARS = 512;
const DEFAULT_OVERLAP = 50;

// Sentence ends (with closing quotes/brackets) plus the whitespace after them,
// or a line break with the whitespace that follows it.
const BOUNDARY_REGEX = /[.!?]+["')\]]*\s+|\n\s*/g;

export interface ChunkSpan {
  index: number;
  text: string;
  startOffset: number;
  endOffset: number;
}

/**
 * Splits `text` into overlapping spans that never cut a sentence.
 *
 * Offsets index into the raw input: `text.slice(startOffset, endOffset)` is the
 * chunk text, the first span starts at 0 and the last ends at `text.length`.
 * A sentence longer than `maxChars` becomes its own oversized span.
 */
export function splitIntoChunks(
  text: string,
  maxChars: number = DEFAULT_MAX_CHARS,
  overlap: number = DEFAULT_OVERLAP,
): ChunkSpan[] {
  if (!Number.isFinite(maxChars) || maxChars < 1) {
    throw new RangeError(`maxChars must be at least 1, got ${maxChars}.`);
  }
  const limit = Math.floor(maxChars);
  const safeOverlap = Math.min(Math.max(Math.floor(overlap), 0), limit - 1);

  if (!text.trim()) {
    return [];
  }

  const boundaries = findSegmentBoundaries(text);
  const spans: ChunkSpan[] = [];

  let chunkStart = 0;
  let chunkEnd = 0;
  // True while the current chunk holds nothing beyond the carried-over overlap.
  let fresh = true;
  let segmentStart = 0;

  const emit = () => {
    spans.push({
      index: spans.length,
      text: text.slice(chunkStart, chunkEnd),
      startOffset: chunkStart,
      endOffset: chunkEnd,
    });
  };

  for (const segmentEnd of boundaries) {
    if (segmentEnd - chunkStart <= limit) {
      chunkEnd = segmentEnd;
      fresh = false;
    } else if (fresh) {
      chunkStart = segmentStart;
      chunkEnd = segmentEnd;
      fresh = false;
    } else {
      emit();
      const overlapStart = findOverlapStart(boundaries, chunkStart, chunkEnd, safeOverlap);
      chunkStart = segmentEnd - overlapStart <= limit ? overlapStart : segmentStart;
      chunkEnd = segmentEnd;
    }
    segmentStart = segmentEnd;
  }

  if (!fresh) {
    emit();
  }

  return spans;
}

/** Rebuilds the source text from ordered spans by dropping the overlapping prefixes. */
export function joinChunkSpans(spans: ChunkSpan[]): string {
  let joined = "";
  let covered = 0;
  for (const span of spans) {
    const skip = Math.max(0, covered - span.startOffset);
    joined += span.text.slice(skip);
    covered = Math.max(covered, span.endOffset);
  }
  return joined;
}

function findSegmentBoundaries(text: string): number[] {
  const boundaries: number[] = [];
  for (const match of text.matchAll(BOUNDARY_REGEX)) {
    const end = (match.index ?? 0) + match[0].length;
    if (end > 0 && end < text.length) {
      boundaries.push(end);
    }
  }
  boundaries.push(text.length);
  return boundaries;
}

function findOverlapStart(
  boundaries: number[],
  chunkStart: number,
  chunkEnd: number,
  overlap: number,
): number {
  if (overlap === 0) {
    return chunkEnd;
  }

  const windowStart = Math.max(chunkStart, chunkEnd - overlap);
  for (const boundary of boundaries) {
    if (boundary >= chunkEnd) {
      break;
    }
    if (boundary >= windowStart) {
      return boundary;
    }
  }
  return windowStart;
}
