import semver from 'semver'

/** Oldest RMK release that supports the commands used by a release run. */
export const MINIMUM_RMK_VERSION = '0.45.0-rc'

/**
 * Check whether an RMK version can be installed.
 *
 * @param version - `latest` or a version with an optional `v` prefix.
 * @returns True for `latest` and for versions not older than v0.45.0-rc.
 */
export function isSupportedRmkVersion(version: string): boolean {
  if (version === 'latest') {
    return true
  }

  let parsed = semver.valid(version.trim().replace(/^v/u, ''))
  if (!parsed) {
    return false
  }

  return semver.gte(parsed, MINIMUM_RMK_VERSION)
}
