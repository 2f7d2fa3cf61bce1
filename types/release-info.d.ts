/** Normalized release information used across the tool. */
export interface ReleaseInfo {
  /** Upload endpoint for assets, without the URI template suffix. */
  uploadUrl: string

  /** Tag name (e.g. V1.2.3). */
  version: string

  /** Release name or tag name when name is not provided. */
  name: string

  /** HTML URL of the release page. */
  url: string

  /** Numeric release identifier. */
  id: number
}
