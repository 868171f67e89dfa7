import type { RuleCategory } from '../../../types/style-guide.types';

/**
 * Substring keywords per category. A token scores at most once per category;
 * the table follows RULE_CATEGORIES order so ties keep the earlier category.
 */
export const CATEGORY_KEYWORDS: ReadonlyArray<[RuleCategory, readonly string[]]> = [
  ['Structure', ['section', 'heading', 'table', 'format', 'layout']],
  ['Numbers', ['number', 'measurement', 'range', 'value', 'unit']],
  ['Domain', ['medical', 'drug', 'company', 'clinical', 'disease']],
  ['Formatting', ['capital', 'space', 'hyphen', 'indent', 'font']],
  ['Punctuation', ['comma', 'period', 'colon', 'semicolon']],
  ['Grammar', ['tense', 'verb', 'sentence', 'plural', 'singular']],
  ['Abbreviation', ['abbreviat', 'acronym', 'initialism']],
  ['Reference', ['reference', 'citation', 'source', 'bibliography']],
];

export const DEFAULT_CATEGORY: RuleCategory = 'Formatting';
