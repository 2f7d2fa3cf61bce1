/** Repository metadata needed before a release run. */
export interface RepositoryInfo {
  /** Default branch (e.g. `master`). */
  defaultBranch: string

  /** Repository in `owner/name` form. */
  fullName: string
}
