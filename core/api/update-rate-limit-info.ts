import type { GitHubClientContext } from '../../types/github-client-context'

/**
 * Update rate limit information from response headers.
 *
 * Missing or non-numeric headers leave the previous values in place.
 *
 * @param context - Client context with mutable rate limit fields.
 * @param headers - Response headers.
 */
export function updateRateLimitInfo(
  context: GitHubClientContext,
  headers: Pick<Headers, 'get'>,
): void {
  let remaining = Number.parseInt(
    headers.get('x-ratelimit-remaining') ?? '',
    10,
  )
  if (Number.isFinite(remaining)) {
    context.rateLimitRemaining = remaining
  }

  let reset = Number.parseInt(headers.get('x-ratelimit-reset') ?? '', 10)
  if (Number.isFinite(reset)) {
    context.rateLimitReset = new Date(reset * 1000)
  }
}
