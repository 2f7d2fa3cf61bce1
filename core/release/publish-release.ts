import { stat } from 'node:fs/promises'
import pc from 'picocolors'

import type { PublishResult } from '../../types/publish-result'
import type { BranchContext } from '../../types/branch-context'
import type { ReleaseConfig } from '../../types/release-config'
import type { GitHubClient } from '../../types/github-client'
import type { ReleaseInfo } from '../../types/release-info'
import type { GitClient } from '../../types/git-client'

import {
  buildCreateReleaseRequest,
  RELEASE_ASSET_NAME,
} from '../requests/build-create-release-request'
import { toHostUnavailable } from '../errors/to-host-unavailable'
import { checkPublishGate } from './check-publish-gate'

/** Identity used for tags created by a release run. */
export const COMMITTER_IDENTITY = {
  email: 'github-actions@github.com',
  name: 'github-actions',
} as const

/**
 * Create the Git tag, push it and create the GitHub release for a version.
 *
 * The sequence is safe to re-run: an existing local tag and an existing
 * release are reused, and the tag push overwrites the remote tag. The release
 * is only looked up after the tag was pushed.
 *
 * @param collaborators - Git working tree and release host.
 * @param collaborators.git - Local Git client.
 * @param collaborators.github - Release host client.
 * @param parameters - Publish inputs.
 * @param parameters.version - Version to publish.
 * @param parameters.context - Triggering ref and repository.
 * @param parameters.config - Run configuration.
 * @param parameters.assetPath - Local path of the release asset.
 * @returns Publish outcome, `skipped` when the gate is closed.
 */
export async function publishRelease(
  collaborators: { github: GitHubClient; git: GitClient },
  parameters: {
    config: Pick<
      ReleaseConfig,
      'majorVersionBranch' | 'artifactVersion' | 'autotag' | 'pushTag'
    >
    context: BranchContext
    assetPath: string
    version: string
  },
): Promise<PublishResult> {
  let { github, git } = collaborators
  let { assetPath, version, context, config } = parameters
  let owner = context.repositoryOwner
  let repo = context.repositoryName

  console.info(
    pc.cyan(
      config.artifactVersion
        ? `Release service for ${context.refName} branch.`
        : 'Release service (only for staging, production or major version branch).',
    ),
  )

  let skipReason = checkPublishGate(config, context)
  if (skipReason) {
    console.info(pc.gray(`Skipped: ${skipReason}`))
    return { reason: skipReason, status: 'skipped' }
  }

  console.info(pc.gray('Configure Git user.name and user.email.'))
  await git.setCommitterIdentity(
    COMMITTER_IDENTITY.name,
    COMMITTER_IDENTITY.email,
  )

  console.info(`Add Git tag ${version}`)
  let tag: 'existing' | 'created' =
    (await git.createAnnotatedTag(version, `Release ${version}`)) === 'exists'
      ? 'existing'
      : 'created'
  if (tag === 'existing') {
    console.warn(
      pc.yellow(`Tag ${version} already exists. Skipping tag creation.`),
    )
  }

  await git.pushTag(version)
  console.info(pc.green(`Tag ${version} successfully sent to origin.`))

  let lookup = await github.getReleaseByTag(owner, repo, version)
  if (lookup.status === 'host-error') {
    throw toHostUnavailable(
      `Error checking for release ${version}`,
      lookup.error,
    )
  }

  if (lookup.status === 'found') {
    console.info(pc.yellow(`GitHub release ${version} already exists.`))
    console.info(pc.gray('Skipped.'))
    return {
      release: 'existing',
      assetUploaded: false,
      status: 'published',
      version,
      tag,
    }
  }

  console.info(`Creating GitHub release ${version}`)
  let release: ReleaseInfo
  try {
    release = await github.createRelease(
      owner,
      repo,
      buildCreateReleaseRequest(version, context.sha),
    )
  } catch (error) {
    throw toHostUnavailable('Error creating release on GitHub', error)
  }

  let assetUploaded = false
  if (await isFile(assetPath)) {
    try {
      await github.uploadReleaseAsset(release, assetPath, RELEASE_ASSET_NAME)
    } catch (error) {
      throw toHostUnavailable(`Error uploading ${RELEASE_ASSET_NAME}`, error)
    }
    assetUploaded = true
    console.info(
      pc.green(
        `The ${RELEASE_ASSET_NAME} file has been successfully uploaded to the release.`,
      ),
    )
  } else {
    console.info(
      pc.gray(`File ${RELEASE_ASSET_NAME} not found, skipping asset loading.`),
    )
  }

  return {
    release: 'created',
    status: 'published',
    assetUploaded,
    version,
    tag,
  }
}

async function isFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile()
  } catch (error) {
    if (
      error instanceof Error &&
      'code' in error &&
      (error.code === 'ENOENT' || error.code === 'ENOTDIR')
    ) {
      return false
    }
    throw error
  }
}
