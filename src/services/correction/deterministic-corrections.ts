/**
 * Deterministic Clinical Corrections
 *
 * Ordered correction table applied to every chunk before retrieval. Each
 * record pairs a matcher with a literal or computed substitution. Records run
 * in declaration order and every record leaves already-corrected text alone,
 * so the table as a whole is idempotent.
 */

import clinicalTermsJson from '../../data/clinical-terms.json';
import { logger } from '../../lib/logger';
import { clinicalTermsSchema } from '../../schemas/style.schemas';
import { escapeRegex } from '../../utils/regex-safety';

export type Substitution = string | ((match: RegExpMatchArray) => string);

export interface CorrectionRecord {
  id: string;
  matcher: RegExp;
  substitution: Substitution;
  /** Record is skipped when this returns false for the current text */
  when?: (text: string) => boolean;
}

export interface CorrectionPassResult {
  correctedText: string;
  changes: string[];
}

const clinicalTerms = clinicalTermsSchema.parse(clinicalTermsJson);

const capitalize = (value: string): string => value.charAt(0).toUpperCase() + value.slice(1);

/** Carry a leading capital from the matched text over to the replacement */
const matchCase = (source: string, target: string): string =>
  /^[A-Z]/.test(source) ? capitalize(target) : target;

export function describeChange(original: string, replacement: string): string {
  return `Changed '${original}' to '${replacement}'`;
}

/**
 * Apply one record, recording a change for every match whose replacement
 * differs from the matched text.
 */
export function applyRecord(text: string, record: CorrectionRecord, changes: string[]): string {
  if (record.when && !record.when(text)) return text;

  record.matcher.lastIndex = 0;
  const matches = record.matcher.global
    ? [...text.matchAll(record.matcher)]
    : [record.matcher.exec(text)].filter((match): match is RegExpExecArray => match !== null);

  if (matches.length === 0) return text;

  let result = '';
  let cursor = 0;

  for (const match of matches) {
    const start = match.index ?? 0;
    const original = match[0];
    const replacement =
      typeof record.substitution === 'string' ? record.substitution : record.substitution(match);

    result += text.slice(cursor, start);
    result += replacement;
    cursor = start + original.length;

    if (replacement !== original) {
      changes.push(describeChange(original, replacement));
    }
  }

  return result + text.slice(cursor);
}

/**
 * Run records in order; a record that throws is logged and skipped.
 */
export function applyRecords(
  text: string,
  records: readonly CorrectionRecord[],
  component = 'Corrections'
): CorrectionPassResult {
  const changes: string[] = [];
  let correctedText = text;

  for (const record of records) {
    try {
      correctedText = applyRecord(correctedText, record, changes);
    } catch (error) {
      logger.error(`[${component}] Correction record ${record.id} failed`, error);
    }
  }

  return { correctedText, changes };
}

// ============================================
// TABLE
// ============================================

const companyRecords: CorrectionRecord[] = [
  {
    id: 'company-daiichi-sankyo',
    matcher: /\bdaiichi[\s-]+sankyo\b/gi,
    substitution: 'Daiichi Sankyo',
  },
];

const structureRecords: CorrectionRecord[] = [
  {
    // Lowercase only: "table 2", "section A"
    id: 'structure-reference',
    matcher: new RegExp(
      `\\b(?:${clinicalTerms.structureTerms.map(escapeRegex).join('|')})(?=\\s+(?:\\d|[A-Z]\\b))`,
      'g'
    ),
    substitution: (match) => capitalize(match[0]),
  },
  ...clinicalTerms.properTerms.map((term): CorrectionRecord => ({
    id: `structure-${term.toLowerCase().replace(/\s+/g, '-')}`,
    // "end of treatment period" belongs to the EOT expansion
    matcher: new RegExp(`(?<!\\bend of\\s)\\b${escapeRegex(term).replace(/ /g, '\\s+')}\\b`, 'gi'),
    substitution: term,
  })),
];

const PHASE_NUMERAL = '(iii|ii|iv|i|1|2|3|4|one|two|three|four)';

const phaseNumber = (numeral: string): string => clinicalTerms.phaseNumbers[numeral.toLowerCase()] ?? numeral;

const phaseRecords: CorrectionRecord[] = [
  {
    // Ranges such as "phase I/II" are normalized on both sides
    id: 'phase-number',
    matcher: new RegExp(`\\bphase\\s+${PHASE_NUMERAL}(?:\\s*/\\s*${PHASE_NUMERAL})?\\b`, 'gi'),
    substitution: (match) => `Phase ${phaseNumber(match[1])}${match[2] ? `/${phaseNumber(match[2])}` : ''}`,
  },
];

const timePointRecords: CorrectionRecord[] = [
  {
    id: 'time-baseline',
    matcher: /\bbase-line\b/gi,
    substitution: (match) => matchCase(match[0], 'baseline'),
  },
  {
    id: 'time-follow-up',
    matcher: /\bfollow\s+up\b/gi,
    substitution: (match) => matchCase(match[0], 'follow-up'),
  },
];

const abbreviationRecords: CorrectionRecord[] = clinicalTerms.firstMentionAbbreviations.map(
  ({ term, abbreviation }): CorrectionRecord => {
    const tag = `(${abbreviation})`;
    return {
      id: `abbreviation-${abbreviation.toLowerCase()}`,
      // Not global: first mention only
      matcher: new RegExp(`\\b${escapeRegex(term)}\\b(?!\\s*${escapeRegex(tag)})`, 'i'),
      substitution: (match) => `${match[0]} ${tag}`,
      when: (text) => !text.includes(tag),
    };
  }
);

const acronymRecords: CorrectionRecord[] = [
  {
    id: 'acronym-uppercase',
    matcher: new RegExp(`\\b(?:${clinicalTerms.acronyms.map(escapeRegex).join('|')})\\b`, 'gi'),
    substitution: (match) => match[0].toUpperCase(),
  },
  {
    id: 'acronym-dispersion',
    matcher: /\((sd|se)\)/gi,
    substitution: (match) => match[0].toUpperCase(),
  },
];

const statisticsRecords: CorrectionRecord[] = [
  {
    id: 'statistics-p-value',
    matcher: /\bp-?\s?value\b/gi,
    substitution: 'P value',
  },
];

const comparisonRecords: CorrectionRecord[] = [
  {
    id: 'comparison-approximately',
    matcher: /\bapproximately\s+(?=\d)/gi,
    substitution: '~',
  },
  {
    id: 'comparison-greater-or-equal',
    matcher: /\bgreater than or equal to\s*/gi,
    substitution: '≥',
  },
  {
    id: 'comparison-less-or-equal',
    matcher: /\bless than or equal to\s*/gi,
    substitution: '≤',
  },
];

const unitRecords: CorrectionRecord[] = [
  {
    id: 'unit-spacing',
    matcher: new RegExp(
      `(\\d+(?:\\.\\d+)?)\\s?(${Object.keys(clinicalTerms.units)
        .sort((a, b) => b.length - a.length)
        .map(escapeRegex)
        .join('|')})\\b`,
      'gi'
    ),
    substitution: (match) => {
      const unit = clinicalTerms.units[match[2].toLowerCase()] ?? match[2];
      return `${match[1]} ${unit}`;
    },
  },
];

const latinRecords: CorrectionRecord[] = [
  {
    id: 'latin-ie-eg',
    matcher: /\b(i\.e|e\.g)\.?,?\s*(?=\w)/gi,
    substitution: (match) => `${matchCase(match[1], match[1].toLowerCase())}., `,
  },
  {
    id: 'latin-versus',
    matcher: /\bvs\.\s*(?=\w)/gi,
    substitution: 'vs ',
  },
  {
    id: 'latin-etc',
    matcher: /\betc\.(?=\w)/gi,
    substitution: 'etc. ',
  },
];

export const DETERMINISTIC_CORRECTIONS: readonly CorrectionRecord[] = [
  ...companyRecords,
  ...structureRecords,
  ...phaseRecords,
  ...timePointRecords,
  ...abbreviationRecords,
  ...acronymRecords,
  ...statisticsRecords,
  ...comparisonRecords,
  ...unitRecords,
  ...latinRecords,
];

/**
 * Post-format pass: no space before % or degrees, none after ~, ≤ or ≥.
 */
export const POST_FORMAT_CORRECTIONS: readonly CorrectionRecord[] = [
  {
    id: 'format-percent-degree',
    matcher: /(\d)\s+(%|°C|°F)/g,
    substitution: (match) => `${match[1]}${match[2]}`,
  },
  {
    id: 'format-approximate',
    matcher: /~\s+(?=\d)/g,
    substitution: '~',
  },
  {
    id: 'format-inequality',
    matcher: /([≤≥])\s+(?=\d)/g,
    substitution: (match) => match[1],
  },
];
