import type { ReleaseErrorCode } from '../../types/release-error-code'

/** Error raised for every expected failure of a release run. */
export class ReleaseError extends Error {
  public readonly code: ReleaseErrorCode

  /**
   * Creates a new ReleaseError.
   *
   * @param code - Failure category.
   * @param message - Human-readable message printed by the CLI.
   * @param options - Standard error options, used to keep the cause.
   */
  public constructor(
    code: ReleaseErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options)
    this.name = 'ReleaseError'
    this.code = code
  }
}

/**
 * Check whether a value is a ReleaseError, optionally of a given code.
 *
 * @param value - Value to check.
 * @param code - Expected failure category.
 * @returns True when the value is a matching ReleaseError.
 */
export function isReleaseError(
  value: unknown,
  code?: ReleaseErrorCode,
): value is ReleaseError {
  return value instanceof ReleaseError && (!code || value.code === code)
}
