import type { BranchContext } from '../../types/branch-context'

import { ReleaseError } from '../errors/release-error'

/**
 * Read the triggering repository and ref from runner variables.
 *
 * @param environment - Environment variables of the run.
 * @returns Branch context of the run.
 */
export function readBranchContext(
  environment: Record<string, undefined | string>,
): BranchContext {
  function required(name: string): string {
    let value = environment[name]?.trim()
    if (!value) {
      throw new ReleaseError(
        'InvalidConfiguration',
        `${name} is not set or has an invalid format.`,
      )
    }
    return value
  }

  let repositoryFullName = required('GITHUB_REPOSITORY')
  let repositoryOwner = required('GITHUB_REPOSITORY_OWNER')
  let prefix = `${repositoryOwner}/`

  if (!repositoryFullName.startsWith(prefix)) {
    throw new ReleaseError(
      'InvalidConfiguration',
      'GITHUB_REPOSITORY is not set or has an invalid format.',
    )
  }

  return {
    repositoryName: repositoryFullName.slice(prefix.length),
    refName: required('GITHUB_REF_NAME'),
    ref: required('GITHUB_REF'),
    sha: required('GITHUB_SHA'),
    repositoryFullName,
    repositoryOwner,
  }
}

/**
 * Branch name of a ref.
 *
 * @param ref - Full Git ref.
 * @returns Branch name, or null when the ref is not a branch.
 */
export function getBranchName(ref: string): string | null {
  return ref.startsWith('refs/heads/') ? ref.slice('refs/heads/'.length) : null
}
