import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'

import type { GitHubClient } from '../types/github-client'
import type { BranchContext } from '../types/branch-context'
import type { ReleaseConfig } from '../types/release-config'
import type { GitClient } from '../types/git-client'

import { runRelease } from '../core/run-release'

let context: BranchContext = {
  repositoryFullName: 'acme/svc',
  ref: 'refs/heads/production',
  repositoryOwner: 'acme',
  repositoryName: 'svc',
  refName: 'production',
  sha: 'abc1234',
}

function createConfig(overrides: Partial<ReleaseConfig> = {}): ReleaseConfig {
  return {
    tenantWorkflowFile: 'project-update.yaml',
    tenantEnvironments: ['tenant1=production'],
    apiUrl: 'https://api.github.com',
    serverUrl: 'https://github.com',
    githubToken: 'test-token',
    majorVersionBranch: '',
    customTenantName: '',
    artifactVersion: '',
    rmkVersion: '',
    pushTag: false,
    autotag: true,
    slack: null,
    ...overrides,
  }
}

function createGit(): GitClient {
  return {
    readHeadSubject: vi
      .fn()
      .mockResolvedValue('Merge pull request #7 from acme/release/v1.4.0'),
    listTags: vi.fn().mockResolvedValue([{ name: 'v1.3.0', createdAt: 1 }]),
    createAnnotatedTag: vi.fn().mockResolvedValue('created'),
    setCommitterIdentity: vi.fn().mockResolvedValue(undefined),
    pushTag: vi.fn().mockResolvedValue(undefined),
  }
}

function createGitHub(): GitHubClient {
  return {
    createRelease: vi.fn().mockResolvedValue({
      uploadUrl: 'https://uploads.github.com/repos/acme/svc/releases/5/assets',
      url: 'https://github.com/acme/svc/releases/tag/v1.4.0',
      name: 'Artifact version - v1.4.0',
      version: 'v1.4.0',
      id: 5,
    }),
    getRepository: vi
      .fn()
      .mockResolvedValue({ defaultBranch: 'main', fullName: 'acme/svc' }),
    getReleaseByTag: vi.fn().mockResolvedValue({ status: 'not-found' }),
    dispatchWorkflow: vi.fn().mockResolvedValue(undefined),
    uploadReleaseAsset: vi.fn(),
    getRateLimitStatus: vi.fn(),
  }
}

describe('runRelease', () => {
  beforeEach(() => {
    vi.spyOn(console, 'info').mockImplementation(() => {})
    vi.spyOn(console, 'warn').mockImplementation(() => {})
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('releases a derived version and notifies tenants and Slack', async () => {
    let fetchSpy = vi
      .spyOn(globalThis, 'fetch')
      .mockResolvedValue(new Response('ok', { status: 200 }))
    let github = createGitHub()
    let git = createGit()

    let summary = await runRelease(
      { github, git },
      {
        config: createConfig({
          slack: {
            webhook: 'https://hooks.example.test/T000',
            releaseNotesPath: 'NOTES.md',
            details: '',
          },
        }),
        assetPath: '/nonexistent/project.yaml',
        context,
      },
    )

    expect(summary).toEqual({
      publish: {
        status: 'published',
        release: 'created',
        assetUploaded: false,
        version: 'v1.4.0',
        tag: 'created',
      },
      tenants: [
        {
          repository: 'acme/tenant1.bootstrap.infra',
          environment: 'production',
          tenant: 'tenant1',
          success: true,
        },
      ],
      decision: {
        previousVersion: 'v1.3.0',
        version: 'v1.4.0',
        kind: 'derived',
      },
      slackNotified: true,
      rmkVersion: null,
    })
    expect(fetchSpy).toHaveBeenCalledOnce()
    expect(fetchSpy.mock.calls[0]?.[0]).toBe('https://hooks.example.test/T000')
  })

  it('stops before mutating anything when the version cannot be resolved', async () => {
    let github = createGitHub()
    let git = createGit()
    vi.mocked(git.readHeadSubject).mockResolvedValue('Update README')

    await expect(
      runRelease(
        { github, git },
        {
          assetPath: '/nonexistent/project.yaml',
          config: createConfig(),
          context,
        },
      ),
    ).rejects.toMatchObject({ code: 'InvalidCommitMessage' })
    expect(git.createAnnotatedTag).not.toHaveBeenCalled()
    expect(github.dispatchWorkflow).not.toHaveBeenCalled()
  })

  it('reports tenant failures without failing the run', async () => {
    let github = createGitHub()
    vi.mocked(github.dispatchWorkflow).mockRejectedValue(
      new Error('fetch failed'),
    )

    let summary = await runRelease(
      { git: createGit(), github },
      {
        assetPath: '/nonexistent/project.yaml',
        config: createConfig(),
        context,
      },
    )

    expect(summary.tenants.map(result => result.success)).toEqual([false])
    expect(summary.slackNotified).toBeFalsy()
  })

  it('installs RMK when a version is configured', async () => {
    vi.spyOn(globalThis, 'fetch').mockResolvedValue(
      new Response('echo install', { status: 200 }),
    )
    let run = vi.fn().mockImplementation((command: string) =>
      Promise.resolve({
        stdout: command === 'rmk' ? 'rmk version v0.46.0' : '',
        stderr: '',
      }),
    )

    let summary = await runRelease(
      { github: createGitHub(), git: createGit(), run },
      {
        config: createConfig({ rmkVersion: 'v0.46.0', tenantEnvironments: [] }),
        assetPath: '/nonexistent/project.yaml',
        context,
      },
    )

    expect(summary.rmkVersion).toBe('v0.46.0')
    expect(run).toHaveBeenCalledTimes(3)
  })
})
