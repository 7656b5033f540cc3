import { EmbeddingProvider } from '../../types/provider.js';

const TOKEN_PATTERN = /[\p{L}\p{N}]+/gu;

/**
 * Local feature-hashing embedder: unigrams and bigrams are hashed into a fixed number of
 * signed buckets and the result is L2-normalised. Needs no model download or server, so it
 * is the default backend and the one used offline.
 */
export class HashEmbeddingProvider implements EmbeddingProvider {
  readonly name = 'hash';
  readonly model = 'feature-hash-v1';
  readonly dimension: number;

  constructor(dimension: number = 384) {
    if (!Number.isInteger(dimension) || dimension < 8) {
      throw new RangeError('Hash embedding dimension must be an integer >= 8');
    }
    this.dimension = dimension;
  }

  async embed(text: string): Promise<number[]> {
    return this.vectorize(text);
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    return texts.map(text => this.vectorize(text));
  }

  private vectorize(text: string): number[] {
    const vector = new Array<number>(this.dimension).fill(0);
    const tokens = text.toLowerCase().match(TOKEN_PATTERN) ?? [];

    tokens.forEach((token, index) => {
      this.accumulate(vector, token, 1);
      const previous = tokens[index - 1];
      if (previous !== undefined) {
        this.accumulate(vector, `${previous} ${token}`, 0.5);
      }
    });

    const norm = Math.sqrt(vector.reduce((sum, value) => sum + value * value, 0));
    return norm > 0 ? vector.map(value => value / norm) : vector;
  }

  private accumulate(vector: number[], feature: string, weight: number): void {
    const hash = fnv1a(feature);
    const bucket = hash % this.dimension;
    const sign = (hash & 0x80000000) === 0 ? 1 : -1;
    vector[bucket] = (vector[bucket] ?? 0) + sign * weight;
  }
}

function fnv1a(input: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < input.length; i++) {
    hash ^= input.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}
