/** Validated payload of a `workflow_dispatch` trigger. */
export interface DispatchWorkflowRequest {
  inputs: {
    project_dependency_version: string
    project_dependency_name: string
  }
  ref: string
}
