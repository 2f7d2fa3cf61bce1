import pc from 'picocolors'

import type { ReleaseDecision } from '../../types/release-decision'
import type { BranchContext } from '../../types/branch-context'
import type { ReleaseConfig } from '../../types/release-config'
import type { GitHubClient } from '../../types/github-client'
import type { GitClient } from '../../types/git-client'

import {
  selectVersionPattern,
  toTagRegExp,
} from '../versions/select-version-pattern'
import { findLatestValidTag } from '../versions/find-latest-valid-tag'
import { matchCommitSubject } from '../versions/match-commit-subject'
import { toHostUnavailable } from '../errors/to-host-unavailable'
import { getBranchName } from '../config/read-branch-context'
import { ReleaseError } from '../errors/release-error'

/**
 * Decide which version a run releases.
 *
 * Steps, in order:
 *
 * 1. A baseline tag matching the active version pattern must exist.
 * 2. The run must be triggered by a branch ref.
 * 3. An explicit version is used as is, skipping derivation.
 * 4. Otherwise the version is taken from the HEAD merge commit subject.
 * 5. A derived version must not have a release yet.
 *
 * Expected failures resolve to a `failed` decision; nothing is mutated.
 *
 * @param collaborators - Git working tree and release host.
 * @param collaborators.git - Local Git client.
 * @param collaborators.github - Release host client.
 * @param parameters - Run inputs.
 * @param parameters.explicitVersion - Version given by the user, may be empty.
 * @param parameters.context - Triggering ref and repository.
 * @param parameters.config - Version related configuration.
 * @returns Release decision.
 */
export async function resolveReleaseState(
  collaborators: { github: GitHubClient; git: GitClient },
  parameters: {
    config: Pick<ReleaseConfig, 'majorVersionBranch' | 'autotag'>
    explicitVersion: string
    context: BranchContext
  },
): Promise<ReleaseDecision> {
  let { github, git } = collaborators
  let { explicitVersion, context, config } = parameters

  try {
    let branch = getBranchName(context.ref)
    let pattern = selectVersionPattern(config.majorVersionBranch, branch)

    let previousVersion = findLatestValidTag(
      await git.listTags(),
      toTagRegExp(pattern),
    )
    if (!previousVersion) {
      throw new ReleaseError(
        'NoBaselineVersion',
        'At least one version tag is required in the repository. Tag a Git ' +
          'commit of the default branch manually before running the workflow.',
      )
    }
    console.info(pc.gray(`Latest version tag: ${previousVersion}`))

    if (!branch) {
      throw new ReleaseError(
        'UnsupportedRefKind',
        `Only pushes to branches are supported, got ${context.ref}. ` +
          "Check the workflow's on.push.* section.",
      )
    }

    let provided = explicitVersion.trim()
    if (provided) {
      console.info(pc.gray(`Using provided version ${provided}`))
      return { kind: 'use-provided', version: provided, previousVersion }
    }

    if (!config.autotag) {
      throw new ReleaseError(
        'InvalidConfiguration',
        'Failed to get artifact version from commit message or input ' +
          'parameter. Enable autotag or set artifact_version.',
      )
    }

    let subject = await git.readHeadSubject()
    console.info(pc.gray(`Git commit message: ${subject}`))

    let match = matchCommitSubject({
      repositoryOwner: context.repositoryOwner,
      majorVersionBranch: config.majorVersionBranch,
      currentBranch: branch,
      subject,
    })
    if (!match.success) {
      return { error: match.error, kind: 'failed' }
    }

    let lookup = await github.getReleaseByTag(
      context.repositoryOwner,
      context.repositoryName,
      match.version,
    )
    if (lookup.status === 'found') {
      throw new ReleaseError(
        'ReleaseAlreadyExists',
        `GitHub release ${match.version} already exists. Increase the ` +
          'version following SemVer and create a new release.',
      )
    }
    if (lookup.status === 'host-error') {
      throw toHostUnavailable(
        `Error checking for release ${match.version}`,
        lookup.error,
      )
    }

    return { version: match.version, kind: 'derived', previousVersion }
  } catch (error) {
    if (error instanceof ReleaseError) {
      return { kind: 'failed', error }
    }
    throw error
  }
}
