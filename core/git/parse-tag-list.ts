import type { GitTagEntry } from '../../types/git-tag-entry'

/** `for-each-ref` format: name, own commit time, peeled commit time. */
export const TAG_LIST_FORMAT =
  '%(refname:strip=2)%09%(committerdate:unix)%09%(*committerdate:unix)'

/**
 * Parse `git for-each-ref refs/tags` output produced with TAG_LIST_FORMAT.
 *
 * Annotated tags carry the commit time in the peeled column, lightweight tags
 * in the direct one. Lines without any usable time are dropped.
 *
 * @param output - Raw command output.
 * @returns Tags with commit timestamps, in output order.
 */
export function parseTagList(output: string): GitTagEntry[] {
  let entries: GitTagEntry[] = []

  for (let line of output.split(/\r?\n/u)) {
    let [name = '', direct = '', peeled = ''] = line.split('\t')
    name = name.trim()
    if (!name) {
      continue
    }

    let createdAt = Number.parseInt(peeled.trim() || direct.trim(), 10)
    if (!Number.isFinite(createdAt)) {
      continue
    }

    entries.push({ createdAt, name })
  }

  return entries
}
