import { readFile } from 'node:fs/promises'

import type { GitHubClientContext } from '../../types/github-client-context'
import type { ReleaseInfo } from '../../types/release-info'

import { makeRequest } from './make-request'

/**
 * Upload a local file to a release.
 *
 * @param context - Client context.
 * @param parameters - Request parameters.
 * @param parameters.release - Target release.
 * @param parameters.filePath - Local file to upload.
 * @param parameters.assetName - Name of the asset on the release.
 */
export async function uploadReleaseAsset(
  context: GitHubClientContext,
  parameters: { release: ReleaseInfo; assetName: string; filePath: string },
): Promise<void> {
  let { assetName, filePath, release } = parameters
  let content = await readFile(filePath)

  await makeRequest(
    context,
    `${release.uploadUrl}?name=${encodeURIComponent(assetName)}`,
    {
      headers: {
        'Content-Length': String(content.byteLength),
        'Content-Type': 'application/octet-stream',
      },
      body: content,
      method: 'POST',
    },
  )
}
