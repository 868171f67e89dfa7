/**
 * Clinical Term Precedence
 *
 * Tags the first mention of adverse-event terms with their abbreviation.
 * One alternation lists the most specific term first, so "serious adverse
 * event" is never tagged as a plain AE.
 */

import type { CorrectionRecord } from './deterministic-corrections';

const ADVERSE_EVENT_TERMS = [
  { matcher: /^treatment[\s-]+emergent adverse event$/i, abbreviation: 'TEAE' },
  { matcher: /^serious adverse event$/i, abbreviation: 'SAE' },
  { matcher: /^adverse event$/i, abbreviation: 'AE' },
] as const;

const ADVERSE_EVENT_PATTERN =
  /\b(treatment[\s-]+emergent adverse event|serious adverse event|adverse event)\b(?!\s*\((?:TEAE|SAE|AE)\))/gi;

function abbreviationFor(term: string): string | undefined {
  return ADVERSE_EVENT_TERMS.find(({ matcher }) => matcher.test(term))?.abbreviation;
}

const normalizeTerm = (term: string): string => term.replace(/(treatment)[\s-]+(emergent)/i, '$1-$2');

/**
 * Build the precedence record for one text. Abbreviations already introduced
 * in the text count as mentioned.
 */
export function createPrecedenceRecord(text: string): CorrectionRecord {
  const mentioned = new Set<string>(
    ADVERSE_EVENT_TERMS.map(({ abbreviation }) => abbreviation).filter((abbreviation) =>
      text.includes(`(${abbreviation})`)
    )
  );

  return {
    id: 'precedence-adverse-event',
    matcher: ADVERSE_EVENT_PATTERN,
    substitution: (match) => {
      const term = normalizeTerm(match[0]);
      const abbreviation = abbreviationFor(match[0]);
      if (!abbreviation || mentioned.has(abbreviation)) return term;

      mentioned.add(abbreviation);
      return `${term} (${abbreviation})`;
    },
  };
}
