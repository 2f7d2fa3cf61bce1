import type { DispatchWorkflowRequest } from '../../types/dispatch-workflow-request'

import { ReleaseError } from '../errors/release-error'

/**
 * Build the payload that tells a tenant repository about a new project
 * version.
 *
 * @param parameters - Payload fields.
 * @param parameters.environment - Tenant branch the workflow runs on.
 * @param parameters.project - Name of the released project.
 * @param parameters.version - Released version.
 * @returns Dispatch payload.
 */
export function buildDispatchWorkflowRequest(parameters: {
  environment: string
  project: string
  version: string
}): DispatchWorkflowRequest {
  let environment = parameters.environment.trim()
  let project = parameters.project.trim()
  let version = parameters.version.trim()

  for (let [field, value] of [
    ['environment', environment],
    ['project', project],
    ['version', version],
  ] as const) {
    if (!value) {
      throw new ReleaseError(
        'InvalidConfiguration',
        `Workflow dispatch ${field} must not be empty.`,
      )
    }
  }

  return {
    inputs: {
      project_dependency_version: version,
      project_dependency_name: project,
    },
    ref: environment,
  }
}
