import type { components } from '@octokit/openapi-types'

import type { CreateReleaseRequest } from '../../types/create-release-request'
import type { GitHubClientContext } from '../../types/github-client-context'
import type { ReleaseInfo } from '../../types/release-info'

import { toReleaseInfo } from './to-release-info'
import { makeRequest } from './make-request'

/**
 * Create a release.
 *
 * @param context - Client context.
 * @param parameters - Request parameters.
 * @param parameters.owner - Repository owner.
 * @param parameters.repo - Repository name.
 * @param parameters.request - Validated release payload.
 * @returns The created release.
 */
export async function createRelease(
  context: GitHubClientContext,
  parameters: { request: CreateReleaseRequest; owner: string; repo: string },
): Promise<ReleaseInfo> {
  let { request, owner, repo } = parameters
  let resp = await makeRequest(context, `/repos/${owner}/${repo}/releases`, {
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(request),
    method: 'POST',
  })
  return toReleaseInfo(resp.data as components['schemas']['release'])
}
