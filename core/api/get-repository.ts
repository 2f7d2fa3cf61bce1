import type { components } from '@octokit/openapi-types'

import type { GitHubClientContext } from '../../types/github-client-context'
import type { RepositoryInfo } from '../../types/repository-info'

import { makeRequest } from './make-request'

/**
 * Fetch repository metadata.
 *
 * @param context - Client context.
 * @param parameters - Request parameters.
 * @param parameters.owner - Repository owner.
 * @param parameters.repo - Repository name.
 * @returns Normalized repository information.
 */
export async function getRepository(
  context: GitHubClientContext,
  parameters: { owner: string; repo: string },
): Promise<RepositoryInfo> {
  let { owner, repo } = parameters
  let resp = await makeRequest(context, `/repos/${owner}/${repo}`)
  let repository = resp.data as components['schemas']['full-repository']

  return {
    defaultBranch: repository.default_branch,
    fullName: repository.full_name,
  }
}
