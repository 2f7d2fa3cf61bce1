import type { ReleaseInputs } from '../../types/release-inputs'

/** Environment variable that backs each input. */
export const INPUT_ENVIRONMENT_VARIABLES = {
  slackMessageReleaseNotesPath: 'INPUT_SLACK_MESSAGE_RELEASE_NOTES_PATH',
  updateTenantEnvironments: 'INPUT_UPDATE_TENANT_ENVIRONMENTS',
  updateTenantWorkflowFile: 'INPUT_UPDATE_TENANT_WORKFLOW_FILE',
  githubToken: 'INPUT_GITHUB_TOKEN_REPO_FULL_ACCESS',
  slackMessageDetails: 'INPUT_SLACK_MESSAGE_DETAILS',
  majorVersionBranch: 'INPUT_MAJOR_VERSION_BRANCH',
  slackNotifications: 'INPUT_SLACK_NOTIFICATIONS',
  customTenantName: 'INPUT_CUSTOM_TENANT_NAME',
  artifactVersion: 'INPUT_ARTIFACT_VERSION',
  slackWebhook: 'INPUT_SLACK_WEBHOOK',
  rmkVersion: 'INPUT_RMK_VERSION',
  pushTag: 'INPUT_PUSH_TAG',
  autotag: 'INPUT_AUTOTAG',
} as const satisfies Record<keyof ReleaseInputs, string>
