import type { SlackPayload } from '../../types/slack-payload'

/**
 * Build the release announcement posted to Slack.
 *
 * @param parameters - Message fields.
 * @param parameters.serverUrl - GitHub web URL.
 * @param parameters.repository - Repository in `owner/name` form.
 * @param parameters.tenantName - Name shown in the heading.
 * @param parameters.version - Released tag.
 * @param parameters.releaseNotesPath - Release notes file in the repository.
 * @param parameters.details - Optional extra text.
 * @returns Webhook payload.
 */
export function buildSlackPayload(parameters: {
  releaseNotesPath: string
  repository: string
  tenantName: string
  serverUrl: string
  details: string
  version: string
}): SlackPayload {
  let { releaseNotesPath, repository, tenantName, serverUrl, details, version } =
    parameters

  let repositoryUrl = `${serverUrl.replace(/\/+$/u, '')}/${repository}`
  let releaseLink = `${repositoryUrl}/tree/${version}|${version}`
  let releaseNotesUrl = `${repositoryUrl}/blob/${version}/${releaseNotesPath}`

  return {
    text:
      `*Released a new version of ${tenantName}*: <${releaseLink}>\n` +
      `*Release notes*: ${releaseNotesUrl}\n` +
      (details ? `*Details*: ${details}` : ''),
    username: 'Tenant artifact action',
    icon_emoji: ':package:',
  }
}

/**
 * Tenant name shown in notifications.
 *
 * @param repositoryName - Repository name without owner.
 * @param customTenantName - Configured override, may be empty.
 * @returns Override, or the repository name up to its first dot.
 */
export function resolveTenantName(
  repositoryName: string,
  customTenantName: string,
): string {
  return customTenantName || (repositoryName.split('.')[0] ?? repositoryName)
}
