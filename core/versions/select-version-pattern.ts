import type { VersionPattern } from '../../types/version-pattern'

import { isMajorVersionBranchName } from './is-major-version-branch-name'
import { ReleaseError } from '../errors/release-error'
import { escapeRegExp } from './escape-reg-exp'

const MAINLINE_VERSION = String.raw`v\d+\.\d+\.\d+(?:-rc)?`

/**
 * Select the version shape accepted on the current branch.
 *
 * On the configured major version branch versions carry the branch name as a
 * suffix (`v4.1.0-project-v4`); everywhere else they are `vX.Y.Z` or
 * `vX.Y.Z-rc`.
 *
 * @param majorVersionBranch - Configured major version branch, may be empty.
 * @param currentBranch - Branch of the run, null for non-branch refs.
 * @returns Unanchored pattern for version tags.
 * @throws {ReleaseError} `InvalidConfiguration` when the configured branch
 *   name does not look like `<name>-v<major>`.
 */
export function selectVersionPattern(
  majorVersionBranch: string,
  currentBranch: string | null,
): VersionPattern {
  let branch = majorVersionBranch.trim()

  if (branch && !isMajorVersionBranchName(branch)) {
    throw new ReleaseError(
      'InvalidConfiguration',
      `Invalid major_version_branch format: '${branch}'. ` +
        `Expected format is '<name>-v<major>'.`,
    )
  }

  if (branch && currentBranch === branch) {
    return {
      source: String.raw`v\d+\.\d+\.\d+-${escapeRegExp(branch)}`,
      usesMajorVersionBranch: true,
    }
  }

  return { usesMajorVersionBranch: false, source: MAINLINE_VERSION }
}

/**
 * Compile a version pattern so that it matches whole tag names only.
 *
 * @param pattern - Pattern returned by selectVersionPattern.
 * @returns Anchored regular expression.
 */
export function toTagRegExp(pattern: VersionPattern): RegExp {
  return new RegExp(`^(?:${pattern.source})$`, 'u')
}
