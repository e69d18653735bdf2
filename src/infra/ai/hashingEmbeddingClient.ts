import { tokenizeWords } from "../../utils/text.js";
import { normalizeVector } from "../../utils/vector.js";
import { EmbeddingGateway } from "./types.js";

const BIGRAM_WEIGHT = 0.5;

/**
 * Offline embedder: hashes word unigrams and bigrams into a fixed number of
 * signed buckets. Texts that share vocabulary land close together, which is
 * enough for local retrieval without a model download.
 */
export class HashingEmbeddingClient implements EmbeddingGateway {
  constructor(private readonly dimension: number) {
    if (!Number.isInteger(dimension) || dimension < 1) {
      throw new RangeError(`Embedding dimension must be a positive integer, got ${dimension}.`);
    }
  }

  isConfigured(): boolean {
    return true;
  }

  async embedTexts(texts: string[]): Promise<number[][]> {
    return texts.map((text) => this.embed(text));
  }

  async embedQuery(text: string): Promise<number[]> {
    return this.embed(text);
  }

  private embed(text: string): number[] {
    const vector = new Array<number>(this.dimension).fill(0);
    const words = tokenizeWords(text);

    const weights = new Map<string, number>();
    for (let i = 0; i < words.length; i += 1) {
      weights.set(words[i], (weights.get(words[i]) ?? 0) + 1);
      if (i > 0) {
        const bigram = `${words[i - 1]} ${words[i]}`;
        weights.set(bigram, (weights.get(bigram) ?? 0) + BIGRAM_WEIGHT);
      }
    }

    for (const [feature, count] of weights) {
      const hash = fnv1a(feature);
      const bucket = hash % this.dimension;
      const sign = fnv1a(`${feature}#sign`) & 1 ? -1 : 1;
      vector[bucket] += sign * (1 + Math.log(count));
    }

    return normalizeVector(vector);
  }
}

function fnv1a(input: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < input.length; i += 1) {
    hash ^= input.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}
