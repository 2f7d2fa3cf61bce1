import { describe, expect, it } from 'vitest'

import { isReleaseError, ReleaseError } from '../../core/errors/release-error'
import { toHostUnavailable } from '../../core/errors/to-host-unavailable'
import { CommandError } from '../../core/errors/command-error'
import { describeError } from '../../core/errors/describe-error'

describe('ReleaseError', () => {
  it('carries the failure code and cause', () => {
    let cause = new Error('root')
    let error = new ReleaseError('HostUnavailable', 'down', { cause })

    expect(error.name).toBe('ReleaseError')
    expect(error.code).toBe('HostUnavailable')
    expect(error.cause).toBe(cause)
    expect(isReleaseError(error)).toBeTruthy()
    expect(isReleaseError(error, 'HostUnavailable')).toBeTruthy()
    expect(isReleaseError(error, 'ToolInstallFailed')).toBeFalsy()
    expect(isReleaseError(new Error('down'))).toBeFalsy()
  })
})

describe('toHostUnavailable', () => {
  it('wraps foreign errors with the action', () => {
    let error = toHostUnavailable('Error creating release', 'timeout')

    expect(error.code).toBe('HostUnavailable')
    expect(error.message).toBe('Error creating release: timeout')
  })

  it('keeps release errors as they are', () => {
    let original = new ReleaseError('InvalidConfiguration', 'bad')

    expect(toHostUnavailable('Error', original)).toBe(original)
  })
})

describe('CommandError', () => {
  it('includes exit code and trimmed stderr', () => {
    expect(new CommandError('git push', 1, 'rejected\n').message).toBe(
      'Command "git push" failed with exit code 1: rejected',
    )
    expect(new CommandError('rmk', null, '').message).toBe(
      'Command "rmk" failed',
    )
  })
})

describe('describeError', () => {
  it('handles non-error values', () => {
    expect(describeError(new Error('x'))).toBe('x')
    expect(describeError(42)).toBe('42')
  })
})
