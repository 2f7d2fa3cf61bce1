import { describe, expect, it } from 'vitest'

import { checkPublishGate } from '../../core/release/check-publish-gate'

let config = {
  majorVersionBranch: '',
  artifactVersion: '',
  pushTag: false,
  autotag: true,
}

describe('checkPublishGate', () => {
  it('opens on staging and production', () => {
    expect(checkPublishGate(config, { ref: 'refs/heads/staging' })).toBeNull()
    expect(
      checkPublishGate(config, { ref: 'refs/heads/production' }),
    ).toBeNull()
  })

  it('opens on the configured major version branch', () => {
    expect(
      checkPublishGate(
        { ...config, majorVersionBranch: 'project-v4' },
        { ref: 'refs/heads/project-v4' },
      ),
    ).toBeNull()
  })

  it('stays closed on other branches', () => {
    expect(checkPublishGate(config, { ref: 'refs/heads/develop' })).toBe(
      'Neither on staging, production nor major version branch.',
    )
  })

  it('opens on any branch when a version is provided', () => {
    expect(
      checkPublishGate(
        { ...config, artifactVersion: 'v1.0.0', autotag: false, pushTag: true },
        { ref: 'refs/heads/develop' },
      ),
    ).toBeNull()
  })

  it('stays closed when neither autotag nor push_tag is set', () => {
    expect(
      checkPublishGate(
        { ...config, artifactVersion: 'v1.0.0', autotag: false },
        { ref: 'refs/heads/production' },
      ),
    ).toBe(
      'Tag and release creation is disabled (neither autotag nor push_tag is set).',
    )
  })
})
