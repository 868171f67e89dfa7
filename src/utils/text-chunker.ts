export const DEFAULT_MAX_CHUNK_SIZE = 500;

const SENTENCE_DELIMITERS = new Set(['.', '!', '?']);

/**
 * Split text into sentences ending in `.`, `!` or `?`.
 * The delimiter stays with its sentence; a delimiter only ends a sentence when
 * followed by whitespace or the end of the text, so `0.05` is not a boundary.
 */
export function splitIntoSentences(text: string): string[] {
  const sentences: string[] = [];
  let start = 0;
  let i = 0;

  while (i < text.length) {
    if (!SENTENCE_DELIMITERS.has(text[i])) {
      i++;
      continue;
    }

    let end = i + 1;
    while (end < text.length && SENTENCE_DELIMITERS.has(text[end])) {
      end++;
    }

    if (end >= text.length || /\s/.test(text[end])) {
      const sentence = text.slice(start, end).trim();
      if (sentence) sentences.push(sentence);
      start = end;
    }
    i = end;
  }

  const tail = text.slice(start).trim();
  if (tail) sentences.push(tail);

  return sentences;
}

/**
 * Greedily pack sentences into chunks of at most `maxChunkSize` characters.
 * A sentence longer than the limit becomes its own chunk and is never split.
 * Non-positive sizes fall back to the default.
 */
export function segmentIntoChunks(
  text: string,
  maxChunkSize = DEFAULT_MAX_CHUNK_SIZE
): string[] {
  const limit =
    Number.isFinite(maxChunkSize) && maxChunkSize > 0
      ? Math.floor(maxChunkSize)
      : DEFAULT_MAX_CHUNK_SIZE;

  const chunks: string[] = [];
  let current = '';

  for (const sentence of splitIntoSentences(text)) {
    if (!current) {
      current = sentence;
      continue;
    }

    if (current.length + 1 + sentence.length > limit) {
      chunks.push(current);
      current = sentence;
    } else {
      current += ' ' + sentence;
    }
  }

  if (current) chunks.push(current);

  return chunks;
}

/**
 * Split extracted document text into paragraphs: blank lines or single line
 * breaks separate paragraphs, empty lines are dropped.
 */
export function splitIntoParagraphs(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}
