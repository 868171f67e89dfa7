/**
 * Rule Extraction Strategies
 *
 * Ordered list of sentence shapes that state a correction. The first strategy
 * that matches a segment wins, so more specific shapes sit before looser ones.
 */

export type CaseTarget = 'upper' | 'lower' | 'title' | 'sentence';

export interface RuleCandidate {
  pattern: string;
  replacement: string;
  context: Record<string, string>;
}

export interface ExtractionStrategy {
  name: string;
  extract: (segment: string) => RuleCandidate | null;
}

const CASE_WORDS =
  '(?:upper\\s*-?\\s*case|lower\\s*-?\\s*case|title\\s*-?\\s*case|sentence\\s*-?\\s*case|capitali[sz]ed|all\\s+caps)';
const QUOTE = '["“”]';
const QUOTED = `${QUOTE}([^"“”]+)${QUOTE}`;

const ARROW_RULE = /^(.+?)\s*(?:→|=>|->)\s*(.+)$/;
const MODAL_RULE = new RegExp(
  `^(?!(?:when|if|unless)\\b)(.+?)\\s+(?:should|must)\\s+(?:always\\s+)?be\\s+(?!(?:written\\s+)?(?:in\\s+)?${CASE_WORDS}\\b)(.+)$`,
  'i'
);
const USE_INSTEAD_RULE = new RegExp(
  `\\buse\\s+${QUOTED}\\s*,?\\s+(?:instead\\s+of|rather\\s+than|not)\\s+${QUOTED}`,
  'i'
);
const WRITE_NOT_RULE = new RegExp(`\\bwrite\\s+${QUOTED}\\s*,?\\s+not\\s+${QUOTED}`, 'i');
const REPLACE_WITH_RULE = new RegExp(`\\breplace\\s+${QUOTED}\\s+with\\s+${QUOTED}`, 'i');
const TRANSFORMATION_RULE = /^(.+?)\s+(?:changes\s+to|becomes)\s+(.+)$/i;
const CASE_RULE = new RegExp(
  `^(.+?)\\s+(?:should|must)\\s+(?:always\\s+)?be\\s+(?:written\\s+)?(?:in\\s+)?(${CASE_WORDS})\\b`,
  'i'
);
const CONTEXT_RULE =
  /^(?:when|if|unless)\s+([^,]+),\s*(.+?)\s+(?:should|must)\s+(?:always\s+)?be\s+(.+)$/i;

const LIST_MARKER = /^\s*(?:\d+[.)]|[a-z]\)|[-•*])\s+/;
const TERM_LEAD = /^(?:the\s+)?(?:term|word|phrase|abbreviation|acronym)\s+/i;
const REPLACEMENT_LEAD =
  /^(?:written|spelled|spelt|expressed|formatted|abbreviated|replaced|presented|used)\s+(?:as|with|by)\s+/i;
const DELETION = /^(?:removed|deleted|omitted)$/i;

export function cleanCapture(value: string): string {
  return value
    .trim()
    .replace(/[.;,:!]+$/, '')
    .trim()
    .replace(/^["'“‘`]+|["'”’`]+$/g, '')
    .trim();
}

const cleanPattern = (value: string): string => cleanCapture(cleanCapture(value).replace(TERM_LEAD, ''));

const cleanReplacement = (value: string): string =>
  cleanCapture(cleanCapture(value).replace(REPLACEMENT_LEAD, ''));

export function stripListMarker(segment: string): string {
  return segment.replace(LIST_MARKER, '');
}

export function toCaseTarget(label: string): CaseTarget {
  const normalized = label.toLowerCase().replace(/[\s-]+/g, '');
  if (normalized.startsWith('upper') || normalized === 'allcaps') return 'upper';
  if (normalized.startsWith('lower')) return 'lower';
  if (normalized.startsWith('title')) return 'title';
  return 'sentence';
}

export function applyCase(value: string, target: CaseTarget): string {
  switch (target) {
    case 'upper':
      return value.toUpperCase();
    case 'lower':
      return value.toLowerCase();
    case 'title':
      return value
        .split(/(\s+)/)
        .map((word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
        .join('');
    case 'sentence':
      return value.charAt(0).toUpperCase() + value.slice(1);
  }
}

function modalCandidate(pattern: string, rawReplacement: string, context: Record<string, string>): RuleCandidate {
  const replacement = cleanReplacement(rawReplacement);
  if (DELETION.test(replacement)) {
    return { pattern: cleanPattern(pattern), replacement: '', context: { ...context, action: 'delete' } };
  }
  return { pattern: cleanPattern(pattern), replacement, context };
}

export const EXTRACTION_STRATEGIES: readonly ExtractionStrategy[] = [
  {
    name: 'arrow',
    extract: (segment) => {
      const match = ARROW_RULE.exec(segment);
      return match
        ? { pattern: cleanPattern(match[1]), replacement: cleanReplacement(match[2]), context: {} }
        : null;
    },
  },
  {
    name: 'modal',
    extract: (segment) => {
      const match = MODAL_RULE.exec(segment);
      return match ? modalCandidate(match[1], match[2], {}) : null;
    },
  },
  {
    name: 'quoted',
    extract: (segment) => {
      const preferred = USE_INSTEAD_RULE.exec(segment) ?? WRITE_NOT_RULE.exec(segment);
      if (preferred) {
        return { pattern: cleanCapture(preferred[2]), replacement: cleanCapture(preferred[1]), context: {} };
      }
      const replace = REPLACE_WITH_RULE.exec(segment);
      return replace
        ? { pattern: cleanCapture(replace[1]), replacement: cleanCapture(replace[2]), context: {} }
        : null;
    },
  },
  {
    name: 'transformation',
    extract: (segment) => {
      const match = TRANSFORMATION_RULE.exec(segment);
      return match
        ? { pattern: cleanPattern(match[1]), replacement: cleanReplacement(match[2]), context: {} }
        : null;
    },
  },
  {
    name: 'case',
    extract: (segment) => {
      const match = CASE_RULE.exec(segment);
      if (!match) return null;
      const pattern = cleanPattern(match[1]);
      const target = toCaseTarget(match[2]);
      return { pattern, replacement: applyCase(pattern, target), context: { case: target } };
    },
  },
  {
    name: 'context',
    extract: (segment) => {
      const match = CONTEXT_RULE.exec(segment);
      return match
        ? modalCandidate(match[2], match[3], { condition: cleanCapture(match[1]) })
        : null;
    },
  },
];
