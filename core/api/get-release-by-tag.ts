import type { components } from '@octokit/openapi-types'

import type { GitHubClientContext } from '../../types/github-client-context'
import type { ReleaseLookup } from '../../types/release-lookup'

import { makeRequest, hasStatus } from './make-request'
import { toReleaseInfo } from './to-release-info'

/**
 * Look up a release by its tag name.
 *
 * A 404 is an expected answer and resolves to `not-found`; every other failure
 * (auth, rate limit, transport) resolves to `host-error` instead of throwing.
 *
 * @param context - Client context.
 * @param parameters - Request parameters.
 * @param parameters.owner - Repository owner.
 * @param parameters.repo - Repository name.
 * @param parameters.tag - Tag name (may include 'refs/tags/' prefix).
 * @returns Found release, not-found, or the host error.
 */
export async function getReleaseByTag(
  context: GitHubClientContext,
  parameters: { owner: string; repo: string; tag: string },
): Promise<ReleaseLookup> {
  let { owner, repo, tag } = parameters
  let displayTag = tag.replace(/^refs\/tags\//u, '')

  try {
    let resp = await makeRequest(
      context,
      `/repos/${owner}/${repo}/releases/tags/${encodeURIComponent(displayTag)}`,
    )
    let release = resp.data as components['schemas']['release']
    return { release: toReleaseInfo(release), status: 'found' }
  } catch (error) {
    if (hasStatus(error, 404)) {
      return { status: 'not-found' }
    }
    return {
      error: error instanceof Error ? error : new Error(String(error)),
      status: 'host-error',
    }
  }
}
