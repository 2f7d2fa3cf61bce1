/**
 * Check whether a branch name follows the `<name>-v<major>` convention.
 *
 * @example
 *   isMajorVersionBranchName('project-v4') // true
 *
 * @param value - Branch name to validate.
 * @returns True when the name can be used as a major version branch.
 */
export function isMajorVersionBranchName(value: string): boolean {
  return /^[\w-]+-v\d+$/u.test(value)
}
