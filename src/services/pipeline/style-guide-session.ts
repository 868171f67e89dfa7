import type { StyleEmbeddingIndex } from '../embedding/embedding-index.service';

export interface PublishedStyleGuide {
  index: StyleEmbeddingIndex;
  sourceName: string;
  ingestedAt: Date;
}

/**
 * Holds the style guide that document corrections run against. A new index
 * replaces the old one only once it is fully built.
 */
export class StyleGuideSession {
  private current: PublishedStyleGuide | null = null;

  get index(): StyleEmbeddingIndex | null {
    return this.current?.index ?? null;
  }

  get sourceName(): string | null {
    return this.current?.sourceName ?? null;
  }

  publish(index: StyleEmbeddingIndex, sourceName: string): PublishedStyleGuide {
    this.current = { index, sourceName, ingestedAt: new Date() };
    return this.current;
  }
}
