import type { ReleaseConfig } from '../../types/release-config'
import type { ReleaseInputs } from '../../types/release-inputs'

import { isMajorVersionBranchName } from '../versions/is-major-version-branch-name'
import { isSupportedRmkVersion } from '../versions/is-supported-rmk-version'
import { INPUT_ENVIRONMENT_VARIABLES } from './input-environment-variables'
import { parseBooleanInput } from './parse-boolean-input'
import { ReleaseError } from '../errors/release-error'

type FlagInput = 'slackNotifications' | 'pushTag' | 'autotag'

/** Workflow file dispatched in tenant repositories by default. */
export const DEFAULT_TENANT_WORKFLOW_FILE = 'project-update.yaml'

/**
 * Build the run configuration.
 *
 * Command line values win over their `INPUT_*` variables. Every check that
 * can fail without touching the network or the working tree happens here.
 *
 * @param inputs - Values given on the command line.
 * @param environment - Environment variables of the run.
 * @returns Validated configuration.
 */
export function resolveReleaseConfig(
  inputs: ReleaseInputs,
  environment: Record<string, undefined | string>,
): ReleaseConfig {
  function text(key: Exclude<keyof ReleaseInputs, FlagInput>): string {
    let value = inputs[key] ?? environment[INPUT_ENVIRONMENT_VARIABLES[key]]
    return String(value ?? '').trim()
  }

  function flag(key: FlagInput): boolean {
    let variable = INPUT_ENVIRONMENT_VARIABLES[key]
    return parseBooleanInput(variable, inputs[key] ?? environment[variable])
  }

  let githubToken = text('githubToken')
  if (!githubToken) {
    throw new ReleaseError(
      'InvalidConfiguration',
      `${INPUT_ENVIRONMENT_VARIABLES.githubToken} is not set or has an ` +
        'invalid format.',
    )
  }

  let majorVersionBranch = text('majorVersionBranch')
  if (majorVersionBranch && !isMajorVersionBranchName(majorVersionBranch)) {
    throw new ReleaseError(
      'InvalidConfiguration',
      `Invalid major_version_branch format: '${majorVersionBranch}'. ` +
        `Expected format is '<name>-v<major>'.`,
    )
  }

  let rmkVersion = text('rmkVersion')
  if (rmkVersion && !isSupportedRmkVersion(rmkVersion)) {
    throw new ReleaseError(
      'InvalidConfiguration',
      `Version ${rmkVersion} of RMK is not correct.\n` +
        'The version for RMK must be at least v0.45.0.',
    )
  }

  let slack: ReleaseConfig['slack'] = null
  if (flag('slackNotifications')) {
    let webhook = text('slackWebhook')
    let releaseNotesPath = text('slackMessageReleaseNotesPath')
    if (!webhook || !releaseNotesPath) {
      throw new ReleaseError(
        'InvalidConfiguration',
        'slack_webhook and slack_message_release_notes_path are required ' +
          'when slack_notifications is enabled.',
      )
    }
    slack = { details: text('slackMessageDetails'), releaseNotesPath, webhook }
  }

  return {
    tenantEnvironments: text('updateTenantEnvironments')
      .split(/\r?\n/u)
      .map(line => line.trim())
      .filter(Boolean),
    serverUrl:
      environment['GITHUB_SERVER_URL']?.trim() || 'https://github.com',
    apiUrl: environment['GITHUB_API_URL']?.trim() || 'https://api.github.com',
    tenantWorkflowFile:
      text('updateTenantWorkflowFile') || DEFAULT_TENANT_WORKFLOW_FILE,
    customTenantName: text('customTenantName'),
    artifactVersion: text('artifactVersion'),
    pushTag: flag('pushTag'),
    autotag: flag('autotag'),
    majorVersionBranch,
    githubToken,
    rmkVersion,
    slack,
  }
}
