import { describe, it, expect } from 'vitest';
import { compileRulePattern, escapeRegex, isUnsafeRegex } from '../../../src/utils/regex-safety';

describe('regex safety', () => {
  it('should flag nested quantifiers as unsafe', () => {
    expect(isUnsafeRegex('(a+)+$')).toBe(true);
    expect(isUnsafeRegex('colou?r')).toBe(false);
  });

  it('should compile safe patterns case-insensitively', () => {
    const result = compileRulePattern('colou?r');

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.regex.test('COLOR')).toBe(true);
    }
  });

  it('should report invalid and unsafe patterns', () => {
    expect(compileRulePattern('([')).toEqual({ ok: false, reason: 'invalid' });
    expect(compileRulePattern('(a+)+$')).toEqual({ ok: false, reason: 'unsafe' });
  });

  it('should escape metacharacters', () => {
    expect(escapeRegex('p < 0.05 (n)')).toBe('p < 0\\.05 \\(n\\)');
    expect(new RegExp(escapeRegex('e.g.')).test('eXg.')).toBe(false);
  });
});
