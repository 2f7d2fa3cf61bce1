import type { CommandRunner } from '../../types/command-runner'
import type { GitClient } from '../../types/git-client'

import { parseTagList, TAG_LIST_FORMAT } from './parse-tag-list'
import { describeError } from '../errors/describe-error'
import { CommandError } from '../errors/command-error'
import { ReleaseError } from '../errors/release-error'
import { runCommand } from '../process/run-command'

/**
 * Create a Git client for a local working tree.
 *
 * Every failure is reported as `TagOperationFailed`, except an existing tag on
 * creation, which resolves to `exists`.
 *
 * @param cwd - Repository working directory.
 * @param run - Command runner, replaceable in tests.
 * @returns Client with bound methods.
 */
export function createGitClient(
  cwd: string,
  run: CommandRunner = runCommand,
): GitClient {
  async function git(args: string[], action: string): Promise<string> {
    try {
      let { stdout } = await run('git', args, { cwd })
      return stdout
    } catch (error) {
      throw new ReleaseError(
        'TagOperationFailed',
        `Failed to ${action}: ${describeError(error)}`,
        { cause: error },
      )
    }
  }

  return {
    createAnnotatedTag: async (name, message) => {
      try {
        await run('git', ['tag', '-a', name, '-m', message], { cwd })
        return 'created'
      } catch (error) {
        if (
          error instanceof CommandError &&
          error.stderr.includes('already exists')
        ) {
          return 'exists'
        }
        throw new ReleaseError(
          'TagOperationFailed',
          `Failed to create Git tag ${name}: ${describeError(error)}`,
          { cause: error },
        )
      }
    },
    setCommitterIdentity: async (name, email) => {
      await git(['config', 'user.name', name], 'set Git user.name')
      await git(['config', 'user.email', email], 'set Git user.email')
    },
    readHeadSubject: async () => {
      let message = await git(
        ['log', '-1', '--format=%B', 'HEAD'],
        'read HEAD commit message',
      )
      return message.trim().split(/\r?\n/u)[0] ?? ''
    },
    listTags: async () => {
      let output = await git(
        ['for-each-ref', `--format=${TAG_LIST_FORMAT}`, 'refs/tags'],
        'list Git tags',
      )
      return parseTagList(output)
    },
    pushTag: async name => {
      await git(
        ['push', '--force', 'origin', `refs/tags/${name}`],
        `push Git tag ${name}`,
      )
    },
  }
}
