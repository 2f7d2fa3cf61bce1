import type { GitTagEntry } from '../../types/git-tag-entry'

/**
 * Pick the most recently created tag whose whole name matches a pattern.
 *
 * Tags are ordered by commit time ascending with a stable sort, so among tags
 * sharing a timestamp the one listed later wins.
 *
 * @param tags - Tags with creation timestamps.
 * @param pattern - Pattern applied to the full tag name.
 * @returns Latest matching tag name or null when none match.
 */
export function findLatestValidTag(
  tags: GitTagEntry[],
  pattern: RegExp,
): string | null {
  let anchored = new RegExp(
    `^(?:${pattern.source})$`,
    pattern.flags.replace(/[gy]/gu, ''),
  )

  let candidates = tags
    .filter(tag => anchored.test(tag.name))
    .sort((a, b) => a.createdAt - b.createdAt)

  return candidates.at(-1)?.name ?? null
}
