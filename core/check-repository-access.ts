import type { BranchContext } from '../types/branch-context'
import type { GitHubClient } from '../types/github-client'

import { toHostUnavailable } from './errors/to-host-unavailable'
import { describeError } from './errors/describe-error'
import { ReleaseError } from './errors/release-error'
import { hasStatus } from './api/make-request'

/**
 * Make sure the token can read the released repository.
 *
 * @param github - Release host client.
 * @param context - Triggering repository.
 */
export async function checkRepositoryAccess(
  github: Pick<GitHubClient, 'getRepository'>,
  context: Pick<
    BranchContext,
    'repositoryFullName' | 'repositoryOwner' | 'repositoryName'
  >,
): Promise<void> {
  try {
    await github.getRepository(context.repositoryOwner, context.repositoryName)
  } catch (error) {
    if (hasStatus(error, 404)) {
      throw new ReleaseError(
        'HostUnavailable',
        `Error accessing GitHub repository.\nRepository ${context.repositoryFullName} Not Found.`,
        { cause: error },
      )
    }
    if (hasStatus(error, 401)) {
      throw new ReleaseError(
        'HostUnavailable',
        `Error accessing GitHub repository.\n${describeError(error)}`,
        { cause: error },
      )
    }
    throw toHostUnavailable('Error accessing GitHub repository', error)
  }
}
