/** Version shape accepted on the current branch. */
export interface VersionPattern {
  /** True when the major version branch suffix is required. */
  usesMajorVersionBranch: boolean

  /** Unanchored regular expression source for a version tag. */
  source: string
}
