/**
 * Style Guide Type Definitions
 * Shared by the segmenter, rule extractor, embedding index and correction engine
 */

/** Declaration order matters: category ties resolve to the earlier entry */
export const RULE_CATEGORIES = [
  'Structure',
  'Numbers',
  'Domain',
  'Formatting',
  'Punctuation',
  'Grammar',
  'Abbreviation',
  'Reference',
] as const;

export type RuleCategory = (typeof RULE_CATEGORIES)[number];

export const RULE_TYPES = ['DIRECT', 'PATTERN', 'MULTI', 'CASE', 'CONTEXT'] as const;

export type RuleType = (typeof RULE_TYPES)[number];

/** Heuristic labels assigned to style-guide chunks during ingestion */
export const CHUNK_RULE_TYPES = [
  'formatting',
  'grammar',
  'punctuation',
  'terminology',
  'structure',
  'general',
] as const;

export type ChunkRuleType = (typeof CHUNK_RULE_TYPES)[number];

export interface StyleRule {
  readonly id: string;
  readonly category: RuleCategory;
  readonly type: RuleType;
  readonly description: string;
  readonly pattern: string;
  /** Empty only for deletion rules (`context.action === 'delete'`) */
  readonly replacement: string;
  readonly examples: readonly string[];
  readonly context: Readonly<Record<string, string>>;
}

export interface StyleChunk {
  content: string;
  ruleType: ChunkRuleType;
  section: string;
  examples: string[];
  metadata: Record<string, string | number | boolean>;
  embedding?: number[];
}

export interface StyleSection {
  title: string;
  body: string;
}

export type IndexedItem =
  | { kind: 'rule'; rule: StyleRule }
  | { kind: 'chunk'; chunk: StyleChunk };

export interface IndexSearchHit {
  item: IndexedItem;
  /** Squared L2 distance, lower is closer */
  distance: number;
  /** Position of the item in the index */
  position: number;
}

export interface CorrectionMatch {
  rule: IndexedItem;
  distance: number;
  /** 0..1 */
  confidence: number;
  changes: string[];
}

export interface CorrectionResult {
  originalText: string;
  correctedText: string;
  appliedRules: CorrectionMatch[];
  /** Change descriptions from the deterministic passes */
  changes: string[];
}

export interface CorrectedParagraph {
  index: number;
  originalText: string;
  correctedText: string;
  chunks: CorrectionResult[];
}

export interface DocumentCorrectionStats {
  totalParagraphs: number;
  totalChunks: number;
  changedChunks: number;
  totalRulesApplied: number;
  totalChanges: number;
}

export interface DocumentCorrectionResult {
  sourceName: string;
  correctedText: string;
  paragraphs: CorrectedParagraph[];
  /** Only chunks whose text changed */
  results: CorrectionResult[];
  stats: DocumentCorrectionStats;
}
