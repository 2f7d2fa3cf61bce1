import pc from 'picocolors'

import type { CommandRunner } from '../../types/command-runner'

import { describeError } from '../errors/describe-error'
import { ReleaseError } from '../errors/release-error'
import { runCommand } from '../process/run-command'

/** Location of the RMK installer script. */
export const RMK_INSTALLER_URL =
  'https://edenlabllc-rmk.s3.eu-north-1.amazonaws.com/rmk/s3-installer'

/**
 * Install the RMK CLI and initialize its configuration.
 *
 * @param parameters - Installation inputs.
 * @param parameters.version - `latest` or a version such as `v0.45.2`.
 * @param parameters.githubToken - Token exposed to RMK as `GITHUB_TOKEN` and
 *   `RMK_GITHUB_TOKEN`.
 * @param parameters.run - Command runner, replaceable in tests.
 * @param parameters.installerUrl - Installer script location.
 * @returns Version reported by `rmk --version`.
 */
export async function installRmk(parameters: {
  installerUrl?: string
  run?: CommandRunner
  githubToken: string
  version: string
}): Promise<string> {
  let {
    installerUrl = RMK_INSTALLER_URL,
    run = runCommand,
    githubToken,
    version,
  } = parameters
  let env = { RMK_GITHUB_TOKEN: githubToken, GITHUB_TOKEN: githubToken }

  console.info(pc.cyan('Install RMK.'))

  let script: string
  try {
    let response = await fetch(installerUrl)
    if (!response.ok) {
      throw new Error(`${response.status} ${response.statusText}`)
    }
    script = await response.text()
  } catch (error) {
    throw new ReleaseError(
      'ToolInstallFailed',
      `Error downloading RMK installer file: ${describeError(error)}`,
      { cause: error },
    )
  }

  let step = 'installing RMK'
  try {
    await run('bash', ['-s', '--', version], { input: script, env })

    step = 'getting RMK version'
    let { stdout } = await run('rmk', ['--version'], { env })
    let output = stdout.trim()
    console.info(output)
    let installed =
      /\s(?<version>\S+)$/u.exec(output)?.groups?.['version'] ?? output
    console.info(pc.green(`RMK version ${installed}`))

    step = 'running RMK config init'
    await run('rmk', ['config', 'init', '--progress-bar=false'], { env })

    return installed
  } catch (error) {
    throw new ReleaseError(
      'ToolInstallFailed',
      `Error ${step}: ${describeError(error)}`,
      { cause: error },
    )
  }
}
