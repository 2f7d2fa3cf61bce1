import type { DispatchWorkflowRequest } from '../../types/dispatch-workflow-request'
import type { GitHubClientContext } from '../../types/github-client-context'

import { makeRequest } from './make-request'

/**
 * Trigger a workflow that has an `on.workflow_dispatch` trigger.
 *
 * @param context - Client context.
 * @param parameters - Request parameters.
 * @param parameters.owner - Repository owner.
 * @param parameters.repo - Repository name.
 * @param parameters.workflowFile - Workflow file name or numeric id.
 * @param parameters.request - Validated dispatch payload.
 */
export async function dispatchWorkflow(
  context: GitHubClientContext,
  parameters: {
    request: DispatchWorkflowRequest
    workflowFile: string
    owner: string
    repo: string
  },
): Promise<void> {
  let { workflowFile, request, owner, repo } = parameters
  await makeRequest(
    context,
    `/repos/${owner}/${repo}/actions/workflows/${encodeURIComponent(workflowFile)}/dispatches`,
    {
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(request),
      method: 'POST',
    },
  )
}
