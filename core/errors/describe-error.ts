/**
 * Turn any thrown value into a single-line message.
 *
 * @param error - Thrown value.
 * @returns Error message or the value converted to string.
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
