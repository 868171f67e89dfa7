import safeRegex from 'safe-regex2';

/**
 * Check a user-supplied pattern for catastrophic backtracking.
 * safe-regex2 returns true when the pattern is SAFE; a throw counts as unsafe.
 */
export function isUnsafeRegex(pattern: string): boolean {
  try {
    return !safeRegex(pattern);
  } catch {
    return true;
  }
}

export type PatternCheck =
  | { ok: true; regex: RegExp }
  | { ok: false; reason: 'invalid' | 'unsafe' };

/**
 * Compile a rule pattern for case-insensitive matching, rejecting invalid or
 * unsafe expressions.
 */
export function compileRulePattern(pattern: string, flags = 'i'): PatternCheck {
  let regex: RegExp;
  try {
    regex = new RegExp(pattern, flags);
  } catch {
    return { ok: false, reason: 'invalid' };
  }

  if (isUnsafeRegex(pattern)) {
    return { ok: false, reason: 'unsafe' };
  }

  return { ok: true, regex };
}

export function escapeRegex(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
