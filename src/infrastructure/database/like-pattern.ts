/**
 * Escapes `%`, `_` and backslash so the value matches literally inside a LIKE
 * pattern (backslash is the default escape character in Postgres).
 */
export function escapeLikePattern(value: string): string {
  return value.replace(/[\\%_]/g, '\\$&');
}
