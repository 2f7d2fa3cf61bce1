import pc from 'picocolors'

import type { ReleaseRunSummary } from '../types/release-run-summary'
import type { CommandRunner } from '../types/command-runner'
import type { BranchContext } from '../types/branch-context'
import type { ReleaseConfig } from '../types/release-config'
import type { GitHubClient } from '../types/github-client'
import type { GitClient } from '../types/git-client'

import {
  resolveTenantName,
  buildSlackPayload,
} from './slack/build-slack-payload'
import { sendSlackNotification } from './slack/send-slack-notification'
import { resolveReleaseState } from './release/resolve-release-state'
import { checkRepositoryAccess } from './check-repository-access'
import { publishRelease } from './release/publish-release'
import { notifyTenants } from './tenants/notify-tenants'
import { installRmk } from './rmk/install-rmk'

/**
 * Run a complete release: resolve the version, publish the tag and release,
 * install RMK, notify tenants and announce the release on Slack.
 *
 * Configuration and version errors are raised before anything is mutated.
 * Tenant failures are reported in the summary and do not fail the run.
 *
 * @param collaborators - Git working tree, release host and command runner.
 * @param parameters - Run inputs.
 * @returns Summary of the run.
 */
export async function runRelease(
  collaborators: {
    github: GitHubClient
    run?: CommandRunner
    git: GitClient
  },
  parameters: {
    context: BranchContext
    config: ReleaseConfig
    assetPath: string
  },
): Promise<ReleaseRunSummary> {
  let { github, git, run } = collaborators
  let { assetPath, context, config } = parameters

  console.info(
    pc.cyan(
      `Tenant: ${resolveTenantName(context.repositoryName, config.customTenantName)}`,
    ),
  )

  await checkRepositoryAccess(github, context)

  let decision = await resolveReleaseState(
    { github, git },
    { explicitVersion: config.artifactVersion, context, config },
  )
  if (decision.kind === 'failed') {
    throw decision.error
  }
  let { version } = decision
  console.info(pc.cyan(`artifact_version: ${version}`))

  let publish = await publishRelease(
    { github, git },
    { assetPath, context, version, config },
  )

  let rmkVersion: string | null = null
  if (config.rmkVersion) {
    rmkVersion = await installRmk({
      githubToken: config.githubToken,
      version: config.rmkVersion,
      run,
    })
  }

  let tenants = await notifyTenants(github, {
    workflowFile: config.tenantWorkflowFile,
    mappings: config.tenantEnvironments,
    project: context.repositoryName,
    context,
    version,
  })

  let slackNotified = false
  if (config.slack) {
    await sendSlackNotification(
      config.slack.webhook,
      buildSlackPayload({
        tenantName: resolveTenantName(
          context.repositoryName,
          config.customTenantName,
        ),
        releaseNotesPath: config.slack.releaseNotesPath,
        repository: context.repositoryFullName,
        details: config.slack.details,
        serverUrl: config.serverUrl,
        version,
      }),
    )
    slackNotified = true
    console.info(pc.green('Slack notification sent.'))
  }

  return { slackNotified, rmkVersion, decision, publish, tenants }
}
