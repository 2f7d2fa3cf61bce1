import type { ReleaseInfo } from './release-info'

/** Three-way outcome of looking up a release by its tag. */
export type ReleaseLookup =
  | {
      status: 'host-error'
      error: Error
    }
  | {
      release: ReleaseInfo
      status: 'found'
    }
  | {
      status: 'not-found'
    }
