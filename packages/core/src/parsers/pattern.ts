import { ValidationError } from '../errors.js';

/**
 * Compile a user-supplied filter. Matching is case-insensitive;
 * an empty or absent pattern yields null, meaning "match everything".
 */
export function compilePattern(pattern: string | null | undefined): RegExp | null {
  if (!pattern) return null;
  try {
    return new RegExp(pattern, 'i');
  } catch (err: unknown) {
    throw new ValidationError(`Invalid regular expression: ${pattern}`, { cause: err });
  }
}

export function matchesPattern(description: string, pattern: RegExp | null): boolean {
  return pattern === null || pattern.test(description);
}
