import type { VersionPattern } from '../../types/version-pattern'
import type { VersionMatch } from '../../types/version-match'

import { selectVersionPattern } from './select-version-pattern'
import { ReleaseError } from '../errors/release-error'
import { escapeRegExp } from './escape-reg-exp'

/**
 * Extract the release version from a pull request merge commit subject.
 *
 * Accepted subjects look like
 * `Merge pull request #42 from <owner>/release/v1.4.0`, with `hotfix/` as an
 * alternative to `release/`. The whole subject must match.
 *
 * @param parameters - Match input.
 * @param parameters.subject - First line of the HEAD commit message.
 * @param parameters.repositoryOwner - Owner the source branch must belong to.
 * @param parameters.majorVersionBranch - Configured major version branch.
 * @param parameters.currentBranch - Branch of the run.
 * @returns The captured version or the failure.
 */
export function matchCommitSubject(parameters: {
  majorVersionBranch: string
  currentBranch: string | null
  repositoryOwner: string
  subject: string
}): VersionMatch {
  let { majorVersionBranch, repositoryOwner, currentBranch, subject } =
    parameters

  let pattern: VersionPattern
  try {
    pattern = selectVersionPattern(majorVersionBranch, currentBranch)
  } catch (error) {
    if (error instanceof ReleaseError) {
      return { success: false, error }
    }
    throw error
  }

  let regex = new RegExp(
    `^Merge pull request #\\d+ from ${escapeRegExp(repositoryOwner)}/(?:release|hotfix)/(?<version>${pattern.source})$`,
    'u',
  )
  let version = regex.exec(subject)?.groups?.['version']

  if (version) {
    return { success: true, version }
  }

  let branch = majorVersionBranch.trim()
  let formats = ['- release|hotfix/vX.Y.Z|vX.Y.Z-rc']
  if (branch) {
    formats.push(`- ${branch}: release|hotfix/vX.Y.Z-${branch}`)
  }

  return {
    error: new ReleaseError(
      'InvalidCommitMessage',
      `Invalid commit message for branch '${currentBranch ?? ''}'.\n` +
        `Expected formats:\n${formats.join('\n')}`,
    ),
    success: false,
  }
}
