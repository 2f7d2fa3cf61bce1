import pc from 'picocolors'

import type { TenantNotificationResult } from '../../types/tenant-notification-result'
import type { BranchContext } from '../../types/branch-context'
import type { GitHubClient } from '../../types/github-client'

import { buildDispatchWorkflowRequest } from '../requests/build-dispatch-workflow-request'
import { getBranchName } from '../config/read-branch-context'
import { describeError } from '../errors/describe-error'
import { ReleaseError } from '../errors/release-error'
import { hasStatus } from '../api/make-request'
import { parseTenantMappings } from './parse-tenant-mappings'

/** Branch whose releases are rolled out to tenants. */
export const FAN_OUT_BRANCH = 'production'

/** Suffix of tenant infrastructure repositories. */
export const TENANT_REPOSITORY_SUFFIX = '.bootstrap.infra'

/**
 * Dispatch the update workflow of every tenant environment.
 *
 * Failures are collected per tenant; one failing dispatch does not stop the
 * remaining ones. Dispatches are not deduplicated across runs.
 *
 * @param github - Release host client.
 * @param parameters - Fan-out inputs.
 * @param parameters.mappings - Raw `tenant=env1,env2` lines.
 * @param parameters.project - Released project (repository name).
 * @param parameters.version - Released version.
 * @param parameters.workflowFile - Workflow file in tenant repositories.
 * @param parameters.context - Triggering ref and repository.
 * @returns One result per dispatched (tenant, environment) pair.
 */
export async function notifyTenants(
  github: Pick<GitHubClient, 'dispatchWorkflow'>,
  parameters: {
    context: Pick<BranchContext, 'repositoryOwner' | 'ref'>
    workflowFile: string
    mappings: string[]
    project: string
    version: string
  },
): Promise<TenantNotificationResult[]> {
  let { workflowFile, mappings, context, project, version } = parameters

  if (getBranchName(context.ref) !== FAN_OUT_BRANCH) {
    console.info(
      pc.gray(
        `Skip tenant environments update (only on ${FAN_OUT_BRANCH} branch).`,
      ),
    )
    return []
  }

  let targets = parseTenantMappings(mappings)
  if (targets.length === 0) {
    console.info(pc.gray('Skip tenant environments update.'))
    return []
  }

  let results: TenantNotificationResult[] = []

  for (let { environment, tenant } of targets) {
    let repo = `${tenant}${TENANT_REPOSITORY_SUFFIX}`
    let repository = `${context.repositoryOwner}/${repo}`

    console.info(
      pc.gray(
        `Notifying tenant '${tenant}': repository ${repository}, ` +
          `environment ${environment}, workflow ${workflowFile}, ` +
          `${project}@${version}`,
      ),
    )

    try {
      await github.dispatchWorkflow(
        context.repositoryOwner,
        repo,
        workflowFile,
        buildDispatchWorkflowRequest({ environment, project, version }),
      )
      console.info(
        pc.green(
          `Updated ${project} dependency in the ${environment} branch of ` +
            `${repo} repository to version ${version}.`,
        ),
      )
      results.push({ success: true, environment, repository, tenant })
    } catch (error) {
      let reason = hasStatus(error, 404)
        ? `Repository ${repository} or workflow ${workflowFile} Not Found.`
        : describeError(error)
      let failure = new ReleaseError(
        'TenantNotificationFailed',
        `Failed to notify tenant '${tenant}' (${environment}): ${reason}`,
        { cause: error },
      )
      console.warn(pc.yellow(failure.message))
      results.push({
        success: false,
        error: failure,
        environment,
        repository,
        tenant,
      })
    }
  }

  return results
}
