/**
 * Correction Engine Service
 *
 * Corrects one chunk of document text:
 * - Deterministic clinical table, adverse-event precedence and post-format passes
 * - Retrieval layer that applies indexed style-guide rules as marked changes
 */

import { config } from '../../config';
import { logger } from '../../lib/logger';
import type { CorrectionMatch, CorrectionResult, IndexedItem } from '../../types/style-guide.types';
import { compileRulePattern, escapeRegex } from '../../utils/regex-safety';
import type { StyleEmbeddingIndex } from '../embedding/embedding-index.service';
import { confidenceFor, isWithinThreshold } from '../embedding/match-scoring';
import { createPrecedenceRecord } from './clinical-term-precedence';
import {
  DETERMINISTIC_CORRECTIONS,
  POST_FORMAT_CORRECTIONS,
  applyRecords,
  describeChange,
  type CorrectionPassResult,
} from './deterministic-corrections';

export interface CorrectionEngineOptions {
  topK: number;
  ruleDistanceThreshold: number;
  chunkDistanceThreshold: number;
  minConfidence: number;
  /** Apply retrieved rules even when the deterministic passes changed the text */
  layerRetrieval: boolean;
}

export type MatchSource = Pick<StyleEmbeddingIndex, 'size' | 'search'>;

export interface RetrievalResult {
  correctedText: string;
  /** In application order: rightmost span first */
  applied: CorrectionMatch[];
}

interface PlannedReplacement {
  match: CorrectionMatch;
  start: number;
  end: number;
  original: string;
  replacement: string;
}

export function formatChangeMarker(replacement: string, confidence: number): string {
  return `<change confidence=${confidence.toFixed(2)}>${replacement}</change>`;
}

const defaultOptions = (): CorrectionEngineOptions => ({
  ...config.retrieval,
  layerRetrieval: config.correction.layerRetrieval,
});

export class CorrectionEngineService {
  private readonly options: CorrectionEngineOptions;

  constructor(options: Partial<CorrectionEngineOptions> = {}) {
    this.options = { ...defaultOptions(), ...options };
  }

  /**
   * Deterministic table, then precedence, then post-format.
   */
  applyCorrections(text: string): CorrectionPassResult {
    const table = applyRecords(text, DETERMINISTIC_CORRECTIONS, 'Correction Engine');
    const precedence = applyRecords(
      table.correctedText,
      [createPrecedenceRecord(table.correctedText)],
      'Correction Engine'
    );
    const formatted = applyRecords(precedence.correctedText, POST_FORMAT_CORRECTIONS, 'Correction Engine');

    return {
      correctedText: formatted.correctedText,
      changes: [...table.changes, ...precedence.changes, ...formatted.changes],
    };
  }

  /**
   * Score index hits, keeping those within the distance threshold for their
   * kind and at or above the minimum confidence.
   */
  async findMatches(text: string, index: MatchSource): Promise<CorrectionMatch[]> {
    const hits = await index.search(text, this.options.topK);
    const matches: CorrectionMatch[] = [];

    for (const { item, distance } of hits) {
      if (!isWithinThreshold(item, distance, this.options)) continue;

      const confidence = confidenceFor(item, distance);
      if (confidence < this.options.minConfidence) continue;

      matches.push({ rule: item, distance, confidence, changes: [] });
    }

    return matches;
  }

  /**
   * Replace the first case-insensitive occurrence of each match's trigger with
   * its example (rules fall back to their replacement), wrapped in a change marker. Spans are applied rightmost first
   * so pending offsets stay valid; a span overlapping an applied one is skipped,
   * and at equal starts the higher confidence wins.
   */
  applyRetrievedRules(text: string, matches: readonly CorrectionMatch[]): RetrievalResult {
    const planned: PlannedReplacement[] = [];

    for (const match of matches) {
      if (match.confidence < this.options.minConfidence) continue;

      const plan = this.planReplacement(text, match);
      if (plan) planned.push(plan);
    }

    planned.sort((a, b) => b.start - a.start || b.match.confidence - a.match.confidence);

    let correctedText = text;
    let leftmostStart = Number.POSITIVE_INFINITY;
    const applied: CorrectionMatch[] = [];

    for (const plan of planned) {
      if (plan.end > leftmostStart) continue;

      correctedText =
        correctedText.slice(0, plan.start) +
        formatChangeMarker(plan.replacement, plan.match.confidence) +
        correctedText.slice(plan.end);
      leftmostStart = plan.start;

      applied.push({
        ...plan.match,
        changes: [...plan.match.changes, describeChange(plan.original, plan.replacement)],
      });
    }

    return { correctedText, applied };
  }

  /**
   * Correct one chunk. Retrieval runs when an index with items is given and
   * either layering is on or the deterministic passes changed nothing.
   */
  async correctChunk(text: string, index?: MatchSource | null): Promise<CorrectionResult> {
    const deterministic = this.applyCorrections(text);
    let correctedText = deterministic.correctedText;
    let appliedRules: CorrectionMatch[] = [];

    const runRetrieval =
      !!index && index.size > 0 && (this.options.layerRetrieval || deterministic.changes.length === 0);

    if (index && runRetrieval) {
      const matches = await this.findMatches(text, index);
      const retrieval = this.applyRetrievedRules(correctedText, matches);
      correctedText = retrieval.correctedText;
      appliedRules = retrieval.applied;
    }

    return {
      originalText: text,
      correctedText,
      appliedRules,
      changes: deterministic.changes,
    };
  }

  private planReplacement(text: string, match: CorrectionMatch): PlannedReplacement | null {
    const replacement = this.replacementFor(match.rule);
    if (replacement === null) return null;

    const found = this.locateTrigger(text, match.rule);
    if (!found || found[0].length === 0) return null;

    const original = found[0];
    if (original === replacement) return null;

    return {
      match,
      start: found.index,
      end: found.index + original.length,
      original,
      replacement,
    };
  }

  private replacementFor(item: IndexedItem): string | null {
    if (item.kind === 'chunk') {
      return item.chunk.examples[0] ?? null;
    }
    return item.rule.examples[0] ?? item.rule.replacement;
  }

  /**
   * First case-insensitive occurrence of the trigger text. PATTERN rules whose
   * text does not occur literally are tried as a safe-checked regex.
   */
  private locateTrigger(text: string, item: IndexedItem): RegExpExecArray | null {
    const trigger = item.kind === 'chunk' ? item.chunk.content : item.rule.pattern;
    if (!trigger.trim()) return null;

    const literal = new RegExp(escapeRegex(trigger), 'i').exec(text);
    if (literal || item.kind === 'chunk' || item.rule.type !== 'PATTERN') return literal;

    const { rule } = item;
    const compiled = compileRulePattern(rule.pattern);
    if (!compiled.ok) {
      logger.error(`[Correction Engine] Skipping rule ${rule.id}: ${compiled.reason} pattern "${rule.pattern}"`);
      return null;
    }
    return compiled.regex.exec(text);
  }
}

export const correctionEngine = new CorrectionEngineService();
