import type { GitHubClientContext } from '../../types/github-client-context'

import { GitHubRateLimitError } from './internal-rate-limit-error'
import { updateRateLimitInfo } from './update-rate-limit-info'

/** Error thrown for non-2xx responses, carrying the HTTP status. */
export type GitHubRequestError = { status: number } & Error

/**
 * Perform an HTTP request against GitHub API with auth and rate-limit updates.
 *
 * Paths starting with `/` are resolved against the context base URL; absolute
 * URLs (asset uploads) are used as is. Empty bodies resolve to null data.
 *
 * @param context - Client context with token and rate-limit state.
 * @param path - API path beginning with '/' or an absolute URL.
 * @param options - Request init options.
 * @returns Response status and parsed data.
 */
export async function makeRequest(
  context: GitHubClientContext,
  path: string,
  options: RequestInit = {},
): Promise<{ status: number; data: unknown }> {
  let headers = new Headers(options.headers)
  headers.set('Accept', 'application/vnd.github+json')
  headers.set('X-GitHub-Api-Version', '2022-11-28')
  headers.set('User-Agent', 'tenant-artifact-release')

  if (context.token) {
    headers.set('Authorization', `Bearer ${context.token}`)
  }

  let url = /^https?:\/\//u.test(path) ? path : `${context.baseUrl}${path}`
  let response = await fetch(url, { ...options, headers })

  updateRateLimitInfo(context, response.headers)

  let text = await response.text()

  if (!response.ok) {
    if (
      (response.status === 403 || response.status === 429) &&
      text.toLowerCase().includes('rate limit')
    ) {
      throw new GitHubRateLimitError(context.rateLimitReset)
    }

    let error = new Error(
      `GitHub API error: ${response.status} ${response.statusText}`,
    ) as GitHubRequestError
    error.status = response.status
    throw error
  }

  let data: unknown = text.trim() === '' ? null : JSON.parse(text)
  return { status: response.status, data }
}

/**
 * Check whether an error came from a GitHub response with the given status.
 *
 * @param error - Caught value.
 * @param status - Expected HTTP status.
 * @returns True when the error carries that status.
 */
export function hasStatus(error: unknown, status: number): boolean {
  return (
    !!error &&
    typeof error === 'object' &&
    'status' in error &&
    error.status === status
  )
}
