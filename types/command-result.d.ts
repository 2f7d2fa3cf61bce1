/** Captured output of a finished subprocess. */
export interface CommandResult {
  stdout: string
  stderr: string
}
