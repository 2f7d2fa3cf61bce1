import type { ReleaseError } from '../core/errors/release-error'

/** Outcome of release state resolution, produced once per run. */
export type ReleaseDecision =
  | {
      /** Latest existing tag matching the active version pattern. */
      previousVersion: string
      kind: 'use-provided'
      version: string
    }
  | {
      previousVersion: string
      kind: 'derived'
      version: string
    }
  | {
      error: ReleaseError
      kind: 'failed'
    }
