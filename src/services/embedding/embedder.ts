/**
 * Text embedders
 *
 * An embedder maps text to a fixed-length vector. The same text always yields
 * the same vector for a given embedder.
 */

import { AppError } from '../../utils/app-error';

export interface Embedder {
  readonly dimension: number;
  embed(text: string): Promise<number[]>;
}

export interface HashingEmbedderOptions {
  dimension?: number;
  normalize?: boolean;
}

export const DEFAULT_HASHING_DIMENSION = 256;

const FNV_OFFSET_BASIS = 0x811c9dc5;
const FNV_PRIME = 0x01000193;

function fnv1a(value: string): number {
  let hash = FNV_OFFSET_BASIS;
  for (let i = 0; i < value.length; i++) {
    hash ^= value.charCodeAt(i);
    hash = Math.imul(hash, FNV_PRIME);
  }
  return hash >>> 0;
}

export function tokenize(text: string): string[] {
  return text.toLowerCase().match(/[a-z0-9]+/g) ?? [];
}

/**
 * Local bag-of-words embedder using feature hashing (FNV-1a into `dimension`
 * buckets). Vectors are L2-normalized unless `normalize` is false; empty text
 * embeds to the zero vector.
 */
export class HashingEmbedder implements Embedder {
  readonly dimension: number;
  private readonly normalize: boolean;

  constructor(options: HashingEmbedderOptions = {}) {
    const dimension = options.dimension ?? DEFAULT_HASHING_DIMENSION;
    if (!Number.isInteger(dimension) || dimension <= 0) {
      throw AppError.badRequest(
        `Embedding dimension must be a positive integer, got ${dimension}`,
        'INVALID_EMBEDDING_DIMENSION'
      );
    }
    this.dimension = dimension;
    this.normalize = options.normalize ?? true;
  }

  embed(text: string): Promise<number[]> {
    return Promise.resolve(this.embedSync(text));
  }

  embedSync(text: string): number[] {
    const vector = new Array<number>(this.dimension).fill(0);

    for (const token of tokenize(text)) {
      vector[fnv1a(token) % this.dimension] += 1;
    }

    if (!this.normalize) return vector;

    const norm = Math.sqrt(vector.reduce((sum, value) => sum + value * value, 0));
    return norm === 0 ? vector : vector.map((value) => value / norm);
  }
}
