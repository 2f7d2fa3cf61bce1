/** Failure categories of a release run. */
export type ReleaseErrorCode =
  | 'TenantNotificationFailed'
  | 'SlackNotificationFailed'
  | 'InvalidConfiguration'
  | 'InvalidCommitMessage'
  | 'ReleaseAlreadyExists'
  | 'TagOperationFailed'
  | 'UnsupportedRefKind'
  | 'NoBaselineVersion'
  | 'ToolInstallFailed'
  | 'HostUnavailable'
