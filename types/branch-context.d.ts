/** Triggering ref and repository, read once from the runner environment. */
export interface BranchContext {
  /** Repository in `owner/name` form. */
  repositoryFullName: string

  /** Repository owner (organization or user). */
  repositoryOwner: string

  /** Repository name without the owner prefix. */
  repositoryName: string

  /** Short ref name (e.g. `production` or `v1.2.3`). */
  refName: string

  /** Full Git ref (e.g. `refs/heads/production`). */
  ref: string

  /** Commit SHA that triggered the run. */
  sha: string
}
