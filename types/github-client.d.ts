import type { DispatchWorkflowRequest } from './dispatch-workflow-request'
import type { CreateReleaseRequest } from './create-release-request'
import type { RepositoryInfo } from './repository-info'
import type { ReleaseLookup } from './release-lookup'
import type { ReleaseInfo } from './release-info'

/**
 * Release host operations used by a release run.
 *
 * Methods are thin wrappers around lower-level functions bound to a client
 * context (auth + rate-limit).
 */
export interface GitHubClient {
  /** Trigger a `workflow_dispatch` workflow by its file name. */
  dispatchWorkflow(
    owner: string,
    repo: string,
    workflowFile: string,
    request: DispatchWorkflowRequest,
  ): Promise<void>

  /** Upload a local file as a release asset. */
  uploadReleaseAsset(
    release: ReleaseInfo,
    filePath: string,
    assetName: string,
  ): Promise<void>

  /** Create a release for an existing tag. */
  createRelease(
    owner: string,
    repo: string,
    request: CreateReleaseRequest,
  ): Promise<ReleaseInfo>

  /** Look up a release by tag name. */
  getReleaseByTag(
    owner: string,
    repo: string,
    tag: string,
  ): Promise<ReleaseLookup>

  /** Fetch repository metadata. */
  getRepository(owner: string, repo: string): Promise<RepositoryInfo>

  /** Current rate limit snapshot. */
  getRateLimitStatus(): { remaining: number; resetAt: Date }
}
