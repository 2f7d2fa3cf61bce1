import pc from 'picocolors'

import type { ReleaseRunSummary } from '../types/release-run-summary'

/**
 * Prints a one-line summary of a finished release run.
 *
 * @param summary - Result of the run.
 */
export function printRunSummary(summary: ReleaseRunSummary): void {
  let failed = summary.tenants.filter(result => !result.success).length
  let notified = summary.tenants.length - failed

  let parts = [
    `version ${pc.yellow(summary.decision.version)}`,
    summary.publish.status === 'published'
      ? `tag ${summary.publish.tag}, release ${summary.publish.release}`
      : 'publishing skipped',
    `${notified}/${summary.tenants.length} tenant environments notified`,
  ]
  if (summary.rmkVersion) {
    parts.push(`RMK ${summary.rmkVersion}`)
  }
  if (summary.slackNotified) {
    parts.push('Slack notified')
  }

  console.info(pc.green(`\n✓ Release finished: ${parts.join('; ')}`))

  if (failed > 0) {
    console.warn(
      pc.yellow(
        `⚠️  ${failed} tenant ${failed === 1 ? 'notification' : 'notifications'} failed`,
      ),
    )
  }
}
