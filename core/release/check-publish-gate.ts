import type { BranchContext } from '../../types/branch-context'
import type { ReleaseConfig } from '../../types/release-config'

import { getBranchName } from '../config/read-branch-context'

/** Branches that publish releases on every push. */
export const RELEASE_BRANCHES = ['staging', 'production'] as const

/**
 * Decide whether tag and release creation runs.
 *
 * @param config - Run configuration.
 * @param context - Triggering ref.
 * @returns Null when publishing runs, otherwise the reason it is skipped.
 */
export function checkPublishGate(
  config: Pick<
    ReleaseConfig,
    'majorVersionBranch' | 'artifactVersion' | 'autotag' | 'pushTag'
  >,
  context: Pick<BranchContext, 'ref'>,
): string | null {
  if (!config.autotag && !config.pushTag) {
    return 'Tag and release creation is disabled (neither autotag nor push_tag is set).'
  }

  let branch = getBranchName(context.ref)
  let supported: string[] = [...RELEASE_BRANCHES]
  if (config.majorVersionBranch) {
    supported.push(config.majorVersionBranch)
  }

  if ((!branch || !supported.includes(branch)) && !config.artifactVersion) {
    return 'Neither on staging, production nor major version branch.'
  }

  return null
}
