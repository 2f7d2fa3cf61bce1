import { describe, expect, it } from 'vitest'

import {
  resolveTenantName,
  buildSlackPayload,
} from '../../core/slack/build-slack-payload'

describe('buildSlackPayload', () => {
  it('links the release tree and release notes', () => {
    expect(
      buildSlackPayload({
        releaseNotesPath: 'docs/release-notes.md',
        serverUrl: 'https://github.com/',
        repository: 'acme/svc',
        tenantName: 'svc',
        version: 'v1.4.0',
        details: '',
      }),
    ).toEqual({
      text:
        '*Released a new version of svc*: ' +
        '<https://github.com/acme/svc/tree/v1.4.0|v1.4.0>\n' +
        '*Release notes*: ' +
        'https://github.com/acme/svc/blob/v1.4.0/docs/release-notes.md\n',
      username: 'Tenant artifact action',
      icon_emoji: ':package:',
    })
  })

  it('appends details when given', () => {
    let { text } = buildSlackPayload({
      serverUrl: 'https://github.com',
      releaseNotesPath: 'NOTES.md',
      details: 'Hotfix for login',
      repository: 'acme/svc',
      tenantName: 'Acme',
      version: 'v1.4.1',
    })

    expect(text.endsWith('\n*Details*: Hotfix for login')).toBeTruthy()
  })
})

describe('resolveTenantName', () => {
  it('prefers the custom name', () => {
    expect(resolveTenantName('svc.infra', 'Acme')).toBe('Acme')
  })

  it('uses the repository name up to the first dot', () => {
    expect(resolveTenantName('acme.bootstrap.infra', '')).toBe('acme')
    expect(resolveTenantName('svc', '')).toBe('svc')
  })
})
