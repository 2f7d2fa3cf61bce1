/** Raw values of every release input, as given on the command line. */
export interface ReleaseInputs {
  slackMessageReleaseNotesPath?: string
  updateTenantEnvironments?: string
  updateTenantWorkflowFile?: string
  slackNotifications?: boolean | string
  slackMessageDetails?: string
  majorVersionBranch?: string
  customTenantName?: string
  artifactVersion?: string
  pushTag?: boolean | string
  autotag?: boolean | string
  slackWebhook?: string
  githubToken?: string
  rmkVersion?: string
}
