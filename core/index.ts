export type { TenantNotificationResult } from '../types/tenant-notification-result'
export type { ReleaseRunSummary } from '../types/release-run-summary'
export type { ReleaseErrorCode } from '../types/release-error-code'
export type { ReleaseDecision } from '../types/release-decision'
export type { ReleaseConfig } from '../types/release-config'
export type { BranchContext } from '../types/branch-context'
export type { PublishResult } from '../types/publish-result'
export type { ReleaseInputs } from '../types/release-inputs'
export type { GitHubClient } from '../types/github-client'
export type { GitClient } from '../types/git-client'

export { readBranchContext, getBranchName } from './config/read-branch-context'
export { resolveReleaseConfig } from './config/resolve-release-config'
export { resolveReleaseState } from './release/resolve-release-state'
export { matchCommitSubject } from './versions/match-commit-subject'
export { findLatestValidTag } from './versions/find-latest-valid-tag'
export { parseTenantMappings } from './tenants/parse-tenant-mappings'
export { createGitHubClient } from './api/create-github-client'
export { ReleaseError, isReleaseError } from './errors/release-error'
export { publishRelease } from './release/publish-release'
export { notifyTenants } from './tenants/notify-tenants'
export { createGitClient } from './git/create-git-client'
export { runRelease } from './run-release'
