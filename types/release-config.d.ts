/** Run configuration assembled once from CLI flags and `INPUT_*` variables. */
export interface ReleaseConfig {
  /** Slack delivery settings, present only when notifications are enabled. */
  slack: SlackConfig | null

  /** Raw `tenant=env1,env2` lines. */
  tenantEnvironments: string[]

  /** Workflow file dispatched in every tenant repository. */
  tenantWorkflowFile: string

  /** Opts into the `vX.Y.Z-<branch>` version shape when on that branch. */
  majorVersionBranch: string

  /** Overrides the tenant name shown in notifications. */
  customTenantName: string

  /** Explicit version that bypasses commit message derivation. */
  artifactVersion: string

  /** RMK version to install, empty to skip installation. */
  rmkVersion: string

  /** Token with full repository access. */
  githubToken: string

  /** GitHub web URL used for links in notifications. */
  serverUrl: string

  /** Forces tag and release creation without autotag. */
  pushTag: boolean

  /** Derive the version from the merge commit message. */
  autotag: boolean

  /** GitHub REST API base URL. */
  apiUrl: string
}

/** Slack incoming-webhook settings. */
export interface SlackConfig {
  /** Path of the release notes file, relative to the repository root. */
  releaseNotesPath: string

  /** Extra text appended to the message. */
  details: string

  /** Incoming webhook URL. */
  webhook: string
}
