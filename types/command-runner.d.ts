import type { CommandResult } from './command-result'

/** Options accepted by a subprocess runner. */
export interface CommandOptions {
  /** Variables merged over the current environment. */
  env?: Record<string, string>

  /** Data written to the process stdin. */
  input?: string

  /** Working directory. */
  cwd?: string
}

/** Runs a command to completion, rejecting on a non-zero exit. */
export type CommandRunner = (
  command: string,
  args: string[],
  options?: CommandOptions,
) => Promise<CommandResult>
