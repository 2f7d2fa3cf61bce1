import { execFile } from 'node:child_process'

import type { CommandOptions } from '../../types/command-runner'
import type { CommandResult } from '../../types/command-result'

import { CommandError } from '../errors/command-error'

/**
 * Run a command to completion and capture its output.
 *
 * @param command - Executable name.
 * @param args - Command arguments.
 * @param options - Working directory, stdin input and environment overlay.
 * @returns Captured stdout and stderr.
 */
export function runCommand(
  command: string,
  args: string[],
  options: CommandOptions = {},
): Promise<CommandResult> {
  let commandLine = [command, ...args].join(' ')

  return new Promise((resolve, reject) => {
    let child = execFile(
      command,
      args,
      {
        env: options.env ? { ...process.env, ...options.env } : process.env,
        maxBuffer: 16 * 1024 * 1024,
        encoding: 'utf8',
        cwd: options.cwd,
      },
      (error, stdout, stderr) => {
        if (error) {
          let exitCode = typeof error.code === 'number' ? error.code : null
          reject(
            new CommandError(commandLine, exitCode, stderr || error.message),
          )
          return
        }
        resolve({ stdout, stderr })
      },
    )

    if (options.input !== undefined) {
      child.stdin?.end(options.input)
    }
  })
}
