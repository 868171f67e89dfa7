import type { IndexedItem } from '../../types/style-guide.types';

export interface MatchThresholds {
  /** Rules are accepted below this squared distance */
  ruleDistanceThreshold: number;
  /** Chunks are accepted below this squared distance */
  chunkDistanceThreshold: number;
}

export function isWithinThreshold(item: IndexedItem, distance: number, thresholds: MatchThresholds): boolean {
  return item.kind === 'rule'
    ? distance < thresholds.ruleDistanceThreshold
    : distance < thresholds.chunkDistanceThreshold;
}

/**
 * Map a distance to a confidence in [0, 1]: `max(0, 1 - d/2)` for chunks,
 * `1 / (1 + d)` for rules.
 */
export function confidenceFor(item: IndexedItem, distance: number): number {
  const d = Math.max(0, distance);
  const confidence = item.kind === 'chunk' ? 1 - d / 2 : 1 / (1 + d);
  return Math.min(1, Math.max(0, confidence));
}
