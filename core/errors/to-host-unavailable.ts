import { ReleaseError } from './release-error'
import { describeError } from './describe-error'

/**
 * Classify a failed release host call as `HostUnavailable`.
 *
 * @param action - What was being done, e.g. `Error checking release v1.0.0`.
 * @param error - Caught value.
 * @returns Error carrying the original one as cause.
 */
export function toHostUnavailable(
  action: string,
  error: unknown,
): ReleaseError {
  if (error instanceof ReleaseError) {
    return error
  }
  return new ReleaseError(
    'HostUnavailable',
    `${action}: ${describeError(error)}`,
    { cause: error },
  )
}
