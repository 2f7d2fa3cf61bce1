import type { components } from '@octokit/openapi-types'

import type { ReleaseInfo } from '../../types/release-info'

/**
 * Normalize a release object returned by the REST API.
 *
 * @param release - Raw release payload.
 * @returns Release info with the upload URL template stripped.
 */
export function toReleaseInfo(
  release: components['schemas']['release'],
): ReleaseInfo {
  return {
    uploadUrl: release.upload_url.replace(/\{[^}]*\}$/u, ''),
    name: release.name ?? release.tag_name,
    version: release.tag_name,
    url: release.html_url,
    id: release.id,
  }
}
