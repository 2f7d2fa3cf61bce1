import type { CreateReleaseRequest } from '../../types/create-release-request'

import { ReleaseError } from '../errors/release-error'

/** Asset that lists dependency versions of an artifact release. */
export const RELEASE_ASSET_NAME = 'project.yaml'

/**
 * Build the payload for creating a published, non-prerelease release.
 *
 * @param version - Tag name of the release.
 * @param targetSha - Commit the tag was created from.
 * @returns Release payload.
 */
export function buildCreateReleaseRequest(
  version: string,
  targetSha: string,
): CreateReleaseRequest {
  let tagName = version.trim()
  if (!tagName) {
    throw new ReleaseError(
      'InvalidConfiguration',
      'Release tag name must not be empty.',
    )
  }
  if (!/^[0-9a-f]{7,40}$/iu.test(targetSha)) {
    throw new ReleaseError(
      'InvalidConfiguration',
      `Release target "${targetSha}" is not a commit SHA.`,
    )
  }

  return {
    body:
      `All dependency versions for the artifact version: \`${tagName}\` ` +
      `are described in the asset file: \`${RELEASE_ASSET_NAME}\``,
    name: `Artifact version - ${tagName}`,
    target_commitish: targetSha,
    prerelease: false,
    tag_name: tagName,
    draft: false,
  }
}
