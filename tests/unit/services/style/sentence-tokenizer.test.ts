import { describe, it, expect } from 'vitest';
import { IntlSentenceTokenizer, joinWrappedLines } from '../../../../src/services/style/sentence-tokenizer';

describe('joinWrappedLines', () => {
  it('should rejoin wrapped prose and keep arrow lines and list items apart', () => {
    const text = 'Numbers below ten should be\nspelled out.\npatient → Subject\n- item one';

    expect(joinWrappedLines(text)).toEqual([
      'Numbers below ten should be spelled out.',
      'patient → Subject',
      '- item one',
    ]);
  });

  it('should skip blank lines', () => {
    expect(joinWrappedLines('\n\nFirst.\n\n\nSecond.\n')).toEqual(['First.', 'Second.']);
  });
});

describe('IntlSentenceTokenizer', () => {
  it('should split a block into sentences', () => {
    const tokenizer = new IntlSentenceTokenizer();
    expect(tokenizer.split('Use SI units. Avoid jargon.')).toEqual(['Use SI units.', 'Avoid jargon.']);
  });
});
