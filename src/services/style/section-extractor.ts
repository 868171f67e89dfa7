/**
 * Section Extractor
 *
 * Splits style-guide text into titled sections and mines the examples and
 * rule-type hints that accompany each chunk of guidance.
 */

import type { ChunkRuleType, StyleSection } from '../../types/style-guide.types';

interface HeadingMatch {
  title: string;
  /** Text on the heading line that belongs to the body */
  remainder?: string;
}

type HeadingDetector = (line: string) => HeadingMatch | null;

const HEADING_DETECTORS: HeadingDetector[] = [
  // Markdown
  (line) => {
    const match = /^#{1,6}\s+(.+)$/.exec(line);
    return match ? { title: match[1].trim() } : null;
  },
  // ALL CAPS label ending in a colon or period
  (line) => {
    const match = /^([A-Z][A-Z0-9 &/()'-]*[A-Z0-9)])\s*[.:]\s*(.*)$/.exec(line);
    return match ? { title: match[1].trim(), remainder: match[2].trim() || undefined } : null;
  },
  // Numbered
  (line) => {
    const match = /^\d+(?:\.\d+)*\.\s+(.+)$/.exec(line);
    return match ? { title: match[1].trim() } : null;
  },
];

function detectHeading(line: string): HeadingMatch | null {
  for (const detect of HEADING_DETECTORS) {
    const heading = detect(line);
    if (heading) return heading;
  }
  return null;
}

/**
 * Split text into `(title, body)` sections on heading lines.
 * Text before the first heading forms an untitled section, dropped when empty.
 */
export function extractSections(text: string): StyleSection[] {
  const sections: StyleSection[] = [];
  let title = '';
  let lines: string[] = [];

  const flush = (): void => {
    const body = lines.join('\n').trim();
    if (title || body) {
      sections.push({ title, body });
    }
  };

  for (const rawLine of text.split(/\r?\n/)) {
    const heading = detectHeading(rawLine.trim());
    if (!heading) {
      lines.push(rawLine);
      continue;
    }

    flush();
    title = heading.title;
    lines = heading.remainder ? [heading.remainder] : [];
  }

  flush();
  return sections;
}

const EXAMPLE_PHRASE = /\b(?:for example|example|e\.g\.)[:,]?\s*([^\n.;)]+)/gi;
const BULLET_LINE = /^\s*[•*-]\s+(.+)$/gm;

const stripQuotes = (value: string): string =>
  value.trim().replace(/^["'“‘]+|["'”’]+$/g, '').trim();

/**
 * Mine example phrases (`Example:`, `For example`, `e.g.`) and bullet lines.
 * Best effort: order of first appearance, duplicates removed.
 */
export function extractExamples(text: string): string[] {
  const examples: string[] = [];

  for (const match of text.matchAll(EXAMPLE_PHRASE)) {
    examples.push(stripQuotes(match[1]));
  }
  for (const match of text.matchAll(BULLET_LINE)) {
    examples.push(stripQuotes(match[1]));
  }

  return [...new Set(examples.filter((example) => example.length > 0))];
}

const CHUNK_RULE_KEYWORDS: ReadonlyArray<[ChunkRuleType, string[]]> = [
  ['formatting', ['format', 'style', 'font', 'spacing', 'margin', 'indent', 'layout']],
  ['grammar', ['grammar', 'tense', 'verb', 'noun', 'sentence', 'phrase']],
  ['punctuation', ['punctuation', 'comma', 'period', 'colon', 'semicolon']],
  ['terminology', ['term', 'word', 'vocabulary', 'glossary', 'definition']],
  ['structure', ['structure', 'organization', 'section', 'heading', 'outline']],
];

/**
 * Label a style-guide chunk by counting keyword hits in its text and section title.
 */
export function identifyChunkRuleType(text: string, section: string): ChunkRuleType {
  const haystack = `${text} ${section}`.toLowerCase();
  let best: ChunkRuleType = 'general';
  let bestScore = 0;

  for (const [ruleType, keywords] of CHUNK_RULE_KEYWORDS) {
    const score = keywords.filter((keyword) => haystack.includes(keyword)).length;
    if (score > bestScore) {
      best = ruleType;
      bestScore = score;
    }
  }

  return best;
}
