import type { FilterRule } from './recipes.js';

/**
 * Every rule carrying a title pattern must match (or, when inverted, must not).
 * Rules without a pattern are ignored, and untitled entries always pass.
 */
export function shouldIncludeItem(title: string | null | undefined, rules: readonly FilterRule[]): boolean {
  if (rules.length === 0 || !title) return true;

  for (const rule of rules) {
    if (!rule.title) continue;

    let matches = new RegExp(rule.title, 'i').test(title);
    if (rule.invert) matches = !matches;

    if (!matches) return false;
  }

  return true;
}

/** Returns the error message for an invalid pattern, or null when it compiles. */
export function checkPattern(pattern: string): string | null {
  try {
    new RegExp(pattern, 'i');
    return null;
  } catch (err) {
    return err instanceof Error ? err.message : String(err);
  }
}
