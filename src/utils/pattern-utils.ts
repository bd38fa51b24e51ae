/**
 * Pattern matching utility for exclusion rules
 */

import { minimatch } from 'minimatch';

/**
 * Matches a file's base name against a rule: an exact name, or a glob.
 * Matching is case-sensitive and dot files are treated like any other name.
 * A leading `#` or `!` is part of the name, never a comment or negation.
 */
export function matchPattern(filename: string, pattern: string): boolean {
  if (filename === pattern) {
    return true;
  }
  return minimatch(filename, pattern, {
    dot: true,
    nocomment: true,
    nonegate: true,
  });
}

export function matchesAnyPattern(
  filename: string,
  patterns: readonly string[],
): boolean {
  return patterns.some((pattern) => matchPattern(filename, pattern));
}

/**
 * Splits repeated and comma-separated pattern arguments into a flat list,
 * dropping blanks and duplicates while keeping first-seen order.
 */
export function normalizePatterns(raw: readonly string[] = []): string[] {
  const patterns = raw
    .flatMap((value) => value.split(','))
    .map((value) => value.trim())
    .filter((value) => value.length > 0);
  return [...new Set(patterns)];
}
