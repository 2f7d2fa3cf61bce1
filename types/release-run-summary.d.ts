import type { TenantNotificationResult } from './tenant-notification-result'
import type { ReleaseDecision } from './release-decision'
import type { PublishResult } from './publish-result'

/** Everything a release run did, returned to the CLI. */
export interface ReleaseRunSummary {
  /** Per-tenant dispatch outcomes, empty when fan-out was skipped. */
  tenants: TenantNotificationResult[]

  /** Version the run released. */
  decision: Extract<ReleaseDecision, { kind: 'use-provided' | 'derived' }>

  /** Installed RMK version, null when installation was skipped. */
  rmkVersion: string | null

  /** Tag and release outcome. */
  publish: PublishResult

  /** True when a Slack message was sent. */
  slackNotified: boolean
}
