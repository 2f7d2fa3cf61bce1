import type { ReleaseError } from '../core/errors/release-error'

/** Result of matching a merge commit subject against the version pattern. */
export type VersionMatch =
  | {
      success: false
      error: ReleaseError
    }
  | {
      version: string
      success: true
    }
