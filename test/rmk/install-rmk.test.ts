import type { Mock } from 'vitest'

import { beforeEach, describe, expect, it, vi } from 'vitest'

import type { CommandRunner } from '../../types/command-runner'

import { RMK_INSTALLER_URL, installRmk } from '../../core/rmk/install-rmk'

describe('installRmk', () => {
  let run: Mock<CommandRunner>

  beforeEach(() => {
    vi.restoreAllMocks()
    vi.spyOn(console, 'info').mockImplementation(() => {})
    run = vi.fn<CommandRunner>().mockImplementation((command, args) =>
      Promise.resolve({
        stdout:
          command === 'rmk' && args[0] === '--version'
            ? 'rmk version v0.45.2\n'
            : '',
        stderr: '',
      }),
    )
  })

  it('pipes the installer to bash and initializes the config', async () => {
    let fetchSpy = vi
      .spyOn(globalThis, 'fetch')
      .mockResolvedValue(new Response('echo install', { status: 200 }))

    let version = await installRmk({
      githubToken: 'test-token',
      version: 'v0.45.2',
      run,
    })

    let env = { RMK_GITHUB_TOKEN: 'test-token', GITHUB_TOKEN: 'test-token' }
    expect(version).toBe('v0.45.2')
    expect(fetchSpy).toHaveBeenCalledWith(RMK_INSTALLER_URL)
    expect(run.mock.calls).toEqual([
      ['bash', ['-s', '--', 'v0.45.2'], { input: 'echo install', env }],
      ['rmk', ['--version'], { env }],
      ['rmk', ['config', 'init', '--progress-bar=false'], { env }],
    ])
  })

  it('fails when the installer cannot be downloaded', async () => {
    vi.spyOn(globalThis, 'fetch').mockResolvedValue(
      new Response('denied', { statusText: 'Forbidden', status: 403 }),
    )

    await expect(
      installRmk({ githubToken: 'test-token', version: 'latest', run }),
    ).rejects.toMatchObject({
      message: 'Error downloading RMK installer file: 403 Forbidden',
      code: 'ToolInstallFailed',
    })
    expect(run).not.toHaveBeenCalled()
  })

  it('names the step that failed', async () => {
    vi.spyOn(globalThis, 'fetch').mockResolvedValue(
      new Response('echo install', { status: 200 }),
    )
    run.mockImplementation(command =>
      command === 'rmk'
        ? Promise.reject(new Error('rmk: command not found'))
        : Promise.resolve({ stdout: '', stderr: '' }),
    )

    await expect(
      installRmk({ githubToken: 'test-token', version: 'latest', run }),
    ).rejects.toThrow('Error getting RMK version: rmk: command not found')
  })
})
