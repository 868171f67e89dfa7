/**
 * Vector stores
 *
 * Positional stores: the id of a vector is the order in which it was added.
 */

import { AppError } from '../../utils/app-error';

export interface VectorHit {
  id: number;
  /** Squared L2 distance */
  distance: number;
}

export interface VectorStore {
  readonly dimension: number;
  readonly size: number;
  /** Appends all vectors or none */
  add(vectors: readonly (readonly number[])[]): void;
  /** At most `min(k, size)` hits, ascending by distance */
  search(query: readonly number[], k: number): VectorHit[];
  getVector(id: number): number[];
}

const INITIAL_CAPACITY = 64;

/**
 * Brute-force squared-L2 store over a growable Float32Array.
 * Ties are ordered by id.
 */
export class FlatL2VectorStore implements VectorStore {
  readonly dimension: number;
  private data: Float32Array;
  private count = 0;

  constructor(dimension: number) {
    if (!Number.isInteger(dimension) || dimension <= 0) {
      throw AppError.badRequest(
        `Vector dimension must be a positive integer, got ${dimension}`,
        'INVALID_EMBEDDING_DIMENSION'
      );
    }
    this.dimension = dimension;
    this.data = new Float32Array(INITIAL_CAPACITY * dimension);
  }

  get size(): number {
    return this.count;
  }

  add(vectors: readonly (readonly number[])[]): void {
    vectors.forEach((vector, i) => this.assertVector(vector, `vector ${i}`));

    this.ensureCapacity(this.count + vectors.length);
    for (const vector of vectors) {
      this.data.set(vector, this.count * this.dimension);
      this.count++;
    }
  }

  search(query: readonly number[], k: number): VectorHit[] {
    this.assertVector(query, 'query');

    const limit = Math.min(Math.floor(k), this.count);
    if (!(limit > 0)) return [];

    const hits: VectorHit[] = [];
    for (let id = 0; id < this.count; id++) {
      const offset = id * this.dimension;
      let distance = 0;
      for (let j = 0; j < this.dimension; j++) {
        const diff = this.data[offset + j] - query[j];
        distance += diff * diff;
      }
      hits.push({ id, distance });
    }

    hits.sort((a, b) => a.distance - b.distance || a.id - b.id);
    return hits.slice(0, limit);
  }

  getVector(id: number): number[] {
    if (!Number.isInteger(id) || id < 0 || id >= this.count) {
      throw AppError.notFound(`No vector at position ${id}`, 'VECTOR_NOT_FOUND');
    }
    const offset = id * this.dimension;
    return Array.from(this.data.subarray(offset, offset + this.dimension));
  }

  private assertVector(vector: readonly number[], label: string): void {
    if (vector.length !== this.dimension) {
      throw AppError.internal(
        `Embedding dimension mismatch for ${label}: expected ${this.dimension}, got ${vector.length}`,
        'EMBEDDING_DIMENSION_MISMATCH'
      );
    }
    if (!vector.every(Number.isFinite)) {
      throw AppError.badRequest(`Embedding for ${label} contains non-finite values`, 'INVALID_EMBEDDING');
    }
  }

  private ensureCapacity(required: number): void {
    const capacity = this.data.length / this.dimension;
    if (required <= capacity) return;

    let next = capacity;
    while (next < required) next *= 2;

    const grown = new Float32Array(next * this.dimension);
    grown.set(this.data);
    this.data = grown;
  }
}
