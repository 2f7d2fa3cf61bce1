import type { GitHubClientContext } from '../../types/github-client-context'
import type { GitHubClient } from '../../types/github-client'

import { uploadReleaseAsset } from './upload-release-asset'
import { getReleaseByTag } from './get-release-by-tag'
import { dispatchWorkflow } from './dispatch-workflow'
import { getRepository } from './get-repository'
import { createRelease } from './create-release'

/**
 * Create a functional GitHub API client with rate-limit tracking.
 *
 * @param token - GitHub token.
 * @param baseUrl - REST API base URL (GitHub Enterprise Server included).
 * @returns Client with bound methods.
 */
export function createGitHubClient(
  token: undefined | string,
  baseUrl: string = 'https://api.github.com',
): GitHubClient {
  let context: GitHubClientContext = {
    baseUrl: baseUrl.replace(/\/+$/u, ''),
    rateLimitRemaining: token ? 5000 : 60,
    rateLimitReset: new Date(),
    token,
  }

  return {
    dispatchWorkflow: (owner, repo, workflowFile, request) =>
      dispatchWorkflow(context, { workflowFile, request, owner, repo }),
    uploadReleaseAsset: (release, filePath, assetName) =>
      uploadReleaseAsset(context, { assetName, filePath, release }),
    getRateLimitStatus: () => ({
      remaining: context.rateLimitRemaining,
      resetAt: context.rateLimitReset,
    }),
    createRelease: (owner, repo, request) =>
      createRelease(context, { request, owner, repo }),
    getReleaseByTag: (owner, repo, tag) =>
      getReleaseByTag(context, { owner, repo, tag }),
    getRepository: (owner, repo) => getRepository(context, { owner, repo }),
  }
}
