/**
 * Internal client context shared by all API functions.
 *
 * Stores auth, rate-limit state and base URL for a single run.
 */
export interface GitHubClientContext {
  /** Remaining requests available per current rate-limit window. */
  rateLimitRemaining: number

  /** GitHub token, if available. */
  token: undefined | string

  /** Scheduled time when rate limit resets. */
  rateLimitReset: Date

  /** GitHub REST API base URL. */
  baseUrl: string
}
