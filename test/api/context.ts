import type { GitHubClientContext } from '../../types/github-client-context'

/**
 * Client context for API tests.
 *
 * @param token - Optional token.
 * @returns Fresh context.
 */
export function createContext(token?: string): GitHubClientContext {
  return {
    rateLimitRemaining: token ? 5000 : 60,
    baseUrl: 'https://api.github.com',
    rateLimitReset: new Date(0),
    token,
  }
}
