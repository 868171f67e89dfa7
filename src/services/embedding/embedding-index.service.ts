/**
 * Style Embedding Index
 *
 * Pairs each indexed rule or chunk with a vector in a VectorStore. Position i
 * of the store always refers to item i; adds are all-or-nothing per batch.
 * The index is append-only and not safe for concurrent ingestion and search.
 */

import { promises as fs } from 'fs';
import path from 'path';
import { logger } from '../../lib/logger';
import { AppError } from '../../utils/app-error';
import {
  INDEX_SNAPSHOT_VERSION,
  indexSnapshotSchema,
  type IndexSnapshot,
} from '../../schemas/style.schemas';
import type { IndexedItem, IndexSearchHit, StyleChunk, StyleRule } from '../../types/style-guide.types';
import type { Embedder } from './embedder';
import { FlatL2VectorStore, type VectorStore } from './vector-store';

export const ruleEmbeddingText = (rule: StyleRule): string => `${rule.pattern} ${rule.replacement}`;

export class StyleEmbeddingIndex {
  private readonly items: IndexedItem[] = [];
  private readonly store: VectorStore;

  constructor(
    private readonly embedder: Embedder,
    store?: VectorStore
  ) {
    this.store = store ?? new FlatL2VectorStore(embedder.dimension);

    if (this.store.dimension !== embedder.dimension) {
      throw AppError.internal(
        `Vector store dimension ${this.store.dimension} does not match embedder dimension ${embedder.dimension}`,
        'EMBEDDING_DIMENSION_MISMATCH'
      );
    }
    if (this.store.size !== 0) {
      throw AppError.badRequest('Vector store must be empty when the index is created', 'INDEX_NOT_EMPTY');
    }
  }

  get size(): number {
    return this.items.length;
  }

  get dimension(): number {
    return this.embedder.dimension;
  }

  getItems(): readonly IndexedItem[] {
    return this.items;
  }

  getRules(): StyleRule[] {
    return this.items.flatMap((item) => (item.kind === 'rule' ? [item.rule] : []));
  }

  /**
   * Index rules by their `pattern + " " + replacement` text.
   */
  async addRules(rules: readonly StyleRule[]): Promise<number> {
    const vectors: number[][] = [];
    for (const rule of rules) {
      vectors.push(await this.embedder.embed(ruleEmbeddingText(rule)));
    }

    this.append(
      rules.map((rule): IndexedItem => ({ kind: 'rule', rule })),
      vectors
    );
    return rules.length;
  }

  /**
   * Index a chunk, embedding its content unless it already carries an embedding.
   */
  async addChunk(chunk: StyleChunk): Promise<void> {
    await this.addChunks([chunk]);
  }

  async addChunks(chunks: readonly StyleChunk[]): Promise<number> {
    const embedded: StyleChunk[] = [];
    const vectors: number[][] = [];
    for (const chunk of chunks) {
      const embedding = chunk.embedding ?? (await this.embedder.embed(chunk.content));
      if (embedding.length !== this.dimension) {
        throw AppError.internal(
          `Chunk embedding has ${embedding.length} dimensions, index expects ${this.dimension}`,
          'EMBEDDING_DIMENSION_MISMATCH'
        );
      }
      embedded.push({ ...chunk, embedding });
      vectors.push(embedding);
    }

    this.append(
      embedded.map((chunk): IndexedItem => ({ kind: 'chunk', chunk })),
      vectors
    );
    return embedded.length;
  }

  /**
   * Nearest items to `queryText`, ascending by distance, at most `min(k, size)`.
   */
  async search(queryText: string, k: number): Promise<IndexSearchHit[]> {
    const limit = Math.min(k, this.size);
    if (!(limit > 0)) return [];

    const query = await this.embedder.embed(queryText);
    const hits: IndexSearchHit[] = [];

    for (const { id, distance } of this.store.search(query, limit)) {
      const item = this.items[id];
      if (!item) {
        logger.warn(`[Embedding Index] Store returned position ${id} outside ${this.size} items, dropping`);
        continue;
      }
      hits.push({ item, distance, position: id });
    }

    return hits;
  }

  toSnapshot(): IndexSnapshot {
    return {
      version: INDEX_SNAPSHOT_VERSION,
      dimension: this.dimension,
      items: this.items.map((item) =>
        item.kind === 'rule'
          ? {
              kind: 'rule' as const,
              rule: { ...item.rule, examples: [...item.rule.examples], context: { ...item.rule.context } },
            }
          : { kind: 'chunk' as const, chunk: { ...item.chunk } }
      ),
      vectors: this.items.map((_, position) => this.store.getVector(position)),
    };
  }

  static fromSnapshot(data: unknown, embedder: Embedder, store?: VectorStore): StyleEmbeddingIndex {
    const parsed = indexSnapshotSchema.safeParse(data);
    if (!parsed.success) {
      throw AppError.badRequest(
        `Invalid index snapshot: ${parsed.error.issues.map((issue) => issue.message).join('; ')}`,
        'INVALID_INDEX_SNAPSHOT'
      );
    }

    const snapshot = parsed.data;
    if (snapshot.dimension !== embedder.dimension) {
      throw AppError.internal(
        `Snapshot dimension ${snapshot.dimension} does not match embedder dimension ${embedder.dimension}`,
        'EMBEDDING_DIMENSION_MISMATCH'
      );
    }

    const index = new StyleEmbeddingIndex(embedder, store);
    index.append(snapshot.items, snapshot.vectors);
    return index;
  }

  async saveIndex(filePath: string): Promise<void> {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, JSON.stringify(this.toSnapshot()), 'utf-8');
    logger.info(`[Embedding Index] Saved ${this.size} items to ${filePath}`);
  }

  static async loadIndex(filePath: string, embedder: Embedder): Promise<StyleEmbeddingIndex> {
    const raw = await fs.readFile(filePath, 'utf-8');

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (error) {
      throw AppError.badRequest(
        `Index file ${filePath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
        'INVALID_INDEX_SNAPSHOT'
      );
    }

    const index = StyleEmbeddingIndex.fromSnapshot(data, embedder);
    logger.info(`[Embedding Index] Loaded ${index.size} items from ${filePath}`);
    return index;
  }

  private append(items: readonly IndexedItem[], vectors: readonly (readonly number[])[]): void {
    if (items.length !== vectors.length) {
      throw AppError.internal(
        `Cannot index ${items.length} items with ${vectors.length} vectors`,
        'INDEX_INCONSISTENT'
      );
    }
    this.store.add(vectors);
    this.items.push(...items);
  }
}
