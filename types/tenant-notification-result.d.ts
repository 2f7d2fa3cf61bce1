import type { ReleaseError } from '../core/errors/release-error'
import type { TenantTarget } from './tenant-target'

/** Outcome of one tenant workflow dispatch. */
export type TenantNotificationResult =
  | ({
      error: ReleaseError
      repository: string
      success: false
    } & TenantTarget)
  | ({
      /** Tenant repository in `owner/name` form. */
      repository: string
      success: true
    } & TenantTarget)
