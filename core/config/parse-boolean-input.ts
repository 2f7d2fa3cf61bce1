import { ReleaseError } from '../errors/release-error'

const TRUE_VALUES = new Set(['true', 'yes', 'on', '1'])
const FALSE_VALUES = new Set(['false', 'no', 'off', '0', ''])

/**
 * Parse a boolean action input.
 *
 * @param name - Input name used in the error message.
 * @param value - Flag value, environment string, or undefined when unset.
 * @returns Parsed boolean, false when unset.
 */
export function parseBooleanInput(
  name: string,
  value: undefined | boolean | string,
): boolean {
  if (typeof value === 'boolean') {
    return value
  }

  let normalized = (value ?? '').trim().toLowerCase()
  if (TRUE_VALUES.has(normalized)) {
    return true
  }
  if (FALSE_VALUES.has(normalized)) {
    return false
  }

  throw new ReleaseError(
    'InvalidConfiguration',
    `Input ${name} must be a boolean, received "${value}".`,
  )
}
