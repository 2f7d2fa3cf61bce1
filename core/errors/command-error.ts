/** Subprocess that exited with a failure. */
export class CommandError extends Error {
  public readonly exitCode: number | null
  public readonly command: string
  public readonly stderr: string

  /**
   * Creates a new CommandError.
   *
   * @param command - Command line that was executed.
   * @param exitCode - Exit code, or null when the process did not start.
   * @param stderr - Captured standard error output.
   */
  public constructor(command: string, exitCode: number | null, stderr: string) {
    let detail = stderr.trim()
    super(
      `Command "${command}" failed${exitCode === null ? '' : ` with exit code ${exitCode}`}${
        detail ? `: ${detail}` : ''
      }`,
    )
    this.name = 'CommandError'
    this.exitCode = exitCode
    this.command = command
    this.stderr = stderr
  }
}
