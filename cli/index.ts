import { join } from 'node:path'
import pc from 'picocolors'
import cac from 'cac'

import type { ReleaseInputs } from '../types/release-inputs'

import { resolveReleaseConfig } from '../core/config/resolve-release-config'
import { readBranchContext } from '../core/config/read-branch-context'
import { createGitHubClient } from '../core/api/create-github-client'
import { RELEASE_ASSET_NAME } from '../core/requests/build-create-release-request'
import { createGitClient } from '../core/git/create-git-client'
import { describeError } from '../core/errors/describe-error'
import { printRunSummary } from './print-run-summary'
import { runRelease } from '../core/run-release'
import { version } from '../package.json'

/** Run the CLI. */
export function run(): void {
  let cli = cac('tenant-artifact-release')

  cli
    .help()
    .version(version)
    .option('--artifact-version <version>', 'Explicit artifact version')
    .option('--autotag', 'Derive the version from the merge commit message')
    .option('--push-tag', 'Create the tag and release without autotag')
    .option('--github-token <token>', 'Token with full repository access')
    .option(
      '--major-version-branch <branch>',
      'Major version branch (e.g. project-v4)',
    )
    .option('--slack-notifications', 'Enable Slack notifications')
    .option('--slack-webhook <url>', 'Slack incoming webhook URL')
    .option('--slack-message-details <text>', 'Extra Slack message text')
    .option(
      '--slack-message-release-notes-path <path>',
      'Release notes file relative to the repository root',
    )
    .option(
      '--update-tenant-environments <list>',
      'Newline separated tenant=env1,env2 entries',
    )
    .option(
      '--update-tenant-workflow-file <file>',
      'Tenant workflow with a workflow_dispatch trigger (default: project-update.yaml)',
    )
    .option('--custom-tenant-name <name>', 'Tenant name used in messages')
    .option('--rmk-version <version>', 'Install RMK (latest or vX.Y.Z)')
    .command('', 'Tag, release and roll out an artifact version')
    .action(async (options: ReleaseInputs) => {
      try {
        let environment = process.env
        let config = resolveReleaseConfig(options, environment)
        let context = readBranchContext(environment)
        let cwd = process.cwd()

        let summary = await runRelease(
          {
            github: createGitHubClient(config.githubToken, config.apiUrl),
            git: createGitClient(cwd),
          },
          { assetPath: join(cwd, RELEASE_ASSET_NAME), context, config },
        )

        printRunSummary(summary)
      } catch (error) {
        console.error(pc.redBright(`Error: ${describeError(error)}`))
        process.exit(1)
      }
    })

  cli.parse()
}
