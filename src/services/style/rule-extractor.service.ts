/**
 * Rule Extractor Service
 *
 * Derives correction rules from free-form style-guide prose:
 * - Tokenizes guide text into sentence segments
 * - Matches each segment against the ordered extraction strategies
 * - Classifies rules by type and category
 */

import { v4 as uuidv4 } from 'uuid';
import { logger } from '../../lib/logger';
import type { RuleCategory, RuleType, StyleRule } from '../../types/style-guide.types';
import { sentenceTokenizer, type SentenceTokenizer } from './sentence-tokenizer';
import { EXTRACTION_STRATEGIES, stripListMarker, type ExtractionStrategy } from './rules/extraction-patterns';
import { CATEGORY_KEYWORDS, DEFAULT_CATEGORY } from './rules/category-keywords';

const CASE_HINTS = ['case', 'upper', 'lower', 'capitaliz'];
const REGEX_METACHARACTERS = ['*', '?', '+', '[', ']', '(', ')', '\\', '|', '^', '$', '{', '}'];
const CONDITIONAL_WORDS = /\b(?:when|if|unless|except)\b/i;
const MULTI_WORD_LIMIT = 3;

const wordCount = (value: string): number => value.split(/\s+/).filter(Boolean).length;

export class RuleExtractorService {
  constructor(
    private readonly tokenizer: SentenceTokenizer = sentenceTokenizer,
    private readonly strategies: readonly ExtractionStrategy[] = EXTRACTION_STRATEGIES
  ) {}

  /**
   * Extract one rule per segment that states a correction.
   * Segments matching no strategy, or yielding an empty pattern, are skipped.
   */
  extractRules(text: string): StyleRule[] {
    const rules: StyleRule[] = [];

    for (const rawSegment of this.tokenizer.split(text)) {
      const segment = stripListMarker(rawSegment).trim();
      if (!segment) continue;

      for (const strategy of this.strategies) {
        const candidate = strategy.extract(segment);
        if (!candidate) continue;

        if (candidate.pattern) {
          rules.push({
            id: uuidv4(),
            category: this.determineCategory(segment),
            type: this.determineRuleType(segment, candidate.pattern, candidate.replacement),
            description: rawSegment.trim(),
            pattern: candidate.pattern,
            replacement: candidate.replacement,
            examples: [],
            context: candidate.context,
          });
        }
        break;
      }
    }

    logger.debug(`[Rule Extractor] Extracted ${rules.length} rules`);
    return rules;
  }

  determineRuleType(segment: string, pattern: string, replacement: string): RuleType {
    const lower = segment.toLowerCase();

    if (CASE_HINTS.some((hint) => lower.includes(hint))) return 'CASE';
    if (wordCount(pattern) > MULTI_WORD_LIMIT || wordCount(replacement) > MULTI_WORD_LIMIT) {
      return 'MULTI';
    }
    if (REGEX_METACHARACTERS.some((char) => pattern.includes(char))) return 'PATTERN';
    if (CONDITIONAL_WORDS.test(segment)) return 'CONTEXT';
    return 'DIRECT';
  }

  /**
   * Score each category by the number of tokens containing one of its keywords.
   */
  determineCategory(segment: string): RuleCategory {
    const tokens = segment.toLowerCase().match(/[a-z0-9]+/g) ?? [];
    let best = DEFAULT_CATEGORY;
    let bestScore = 0;

    for (const [category, keywords] of CATEGORY_KEYWORDS) {
      const score = tokens.filter((token) => keywords.some((keyword) => token.includes(keyword))).length;
      if (score > bestScore) {
        best = category;
        bestScore = score;
      }
    }

    return best;
  }

  categorizeRules(rules: readonly StyleRule[]): Record<RuleCategory, StyleRule[]> {
    const grouped: Record<RuleCategory, StyleRule[]> = {
      Structure: [],
      Numbers: [],
      Domain: [],
      Formatting: [],
      Punctuation: [],
      Grammar: [],
      Abbreviation: [],
      Reference: [],
    };

    for (const rule of rules) {
      grouped[rule.category].push(rule);
    }

    return grouped;
  }

  /**
   * Keep the first rule per case-insensitive (pattern, replacement) pair,
   * folding later duplicates' examples into it.
   */
  deduplicateRules(rules: readonly StyleRule[]): StyleRule[] {
    const unique = new Map<string, StyleRule>();

    for (const rule of rules) {
      const key = `${rule.pattern.toLowerCase()}\u0000${rule.replacement.toLowerCase()}`;
      const existing = unique.get(key);
      if (!existing) {
        unique.set(key, rule);
        continue;
      }
      unique.set(key, {
        ...existing,
        examples: [...new Set([...existing.examples, ...rule.examples])],
      });
    }

    return [...unique.values()];
  }
}

export const ruleExtractor = new RuleExtractorService();
