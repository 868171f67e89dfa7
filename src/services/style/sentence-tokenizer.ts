/**
 * Sentence tokenization for style-guide text.
 *
 * Guide text arrives as extracted lines: list items, arrow tables and prose
 * wrapped at the page width. Lines are regrouped first, then split into
 * sentences with the ICU sentence segmenter.
 */

export interface SentenceTokenizer {
  split(text: string): string[];
}

const LIST_MARKER = /^\s*(?:\d+[.)]|[a-z]\)|[-•*])\s+/;
const ARROW = /→|=>|->/;
const TERMINAL = /[.!?:;]["'”’)]*$/;

/**
 * A line continues the previous one when the previous line has no terminal
 * punctuation, neither line is an arrow mapping, and the line starts lowercase
 * without a list marker.
 */
function isContinuation(previous: string, line: string): boolean {
  if (TERMINAL.test(previous) || ARROW.test(previous) || ARROW.test(line)) return false;
  if (LIST_MARKER.test(line)) return false;
  return /^[a-z]/.test(line);
}

export function joinWrappedLines(text: string): string[] {
  const blocks: string[] = [];

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line) continue;

    const last = blocks.length - 1;
    if (last >= 0 && isContinuation(blocks[last], line)) {
      blocks[last] = `${blocks[last]} ${line}`;
    } else {
      blocks.push(line);
    }
  }

  return blocks;
}

export class IntlSentenceTokenizer implements SentenceTokenizer {
  private readonly segmenter: Intl.Segmenter;

  constructor(locale = 'en') {
    this.segmenter = new Intl.Segmenter(locale, { granularity: 'sentence' });
  }

  split(text: string): string[] {
    const sentences: string[] = [];

    for (const block of joinWrappedLines(text)) {
      for (const { segment } of this.segmenter.segment(block)) {
        const sentence = segment.trim();
        if (sentence) sentences.push(sentence);
      }
    }

    return sentences;
  }
}

export const sentenceTokenizer: SentenceTokenizer = new IntlSentenceTokenizer();
