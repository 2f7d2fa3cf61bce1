/* eslint-disable camelcase */

import { beforeEach, describe, expect, it, vi } from 'vitest'

import { createRelease } from '../../core/api/create-release'
import { createContext } from './context'

describe('createRelease', () => {
  beforeEach(() => vi.restoreAllMocks())

  it('posts the request as JSON and normalizes the response', async () => {
    let spy = vi.spyOn(globalThis, 'fetch').mockResolvedValue(
      new Response(
        JSON.stringify({
          upload_url:
            'https://uploads.github.com/repos/o/r/releases/9/assets{?name,label}',
          html_url: 'https://github.com/o/r/releases/tag/v1.4.0',
          name: 'Artifact version - v1.4.0',
          tag_name: 'v1.4.0',
          id: 9,
        }),
        { status: 201 },
      ),
    )
    let request = {
      body: 'notes',
      name: 'Artifact version - v1.4.0',
      target_commitish: 'abc1234',
      prerelease: false,
      tag_name: 'v1.4.0',
      draft: false,
    } as const

    let release = await createRelease(createContext('t'), {
      owner: 'o',
      repo: 'r',
      request,
    })

    expect(release).toEqual({
      uploadUrl: 'https://uploads.github.com/repos/o/r/releases/9/assets',
      url: 'https://github.com/o/r/releases/tag/v1.4.0',
      name: 'Artifact version - v1.4.0',
      version: 'v1.4.0',
      id: 9,
    })
    let [url, init] = spy.mock.calls[0] ?? []
    expect(url).toBe('https://api.github.com/repos/o/r/releases')
    expect(init?.method).toBe('POST')
    expect(init?.body).toBe(JSON.stringify(request))
  })

  it('propagates API errors', async () => {
    vi.spyOn(globalThis, 'fetch').mockResolvedValue(
      new Response('Validation Failed', {
        statusText: 'Unprocessable Entity',
        status: 422,
      }),
    )

    await expect(
      createRelease(createContext('t'), {
        request: {
          target_commitish: 'abc1234',
          name: 'Artifact version - v1.4.0',
          prerelease: false,
          tag_name: 'v1.4.0',
          draft: false,
          body: 'notes',
        },
        owner: 'o',
        repo: 'r',
      }),
    ).rejects.toThrow('GitHub API error: 422 Unprocessable Entity')
  })
})

/* eslint-enable camelcase */
