/**
 * Escape a literal string for use inside a regular expression.
 *
 * @param value - Literal text.
 * @returns Text with every regex metacharacter escaped.
 */
export function escapeRegExp(value: string): string {
  return value.replace(/[$()*+.?[\\\]^{|}]/gu, '\\$&')
}
