import type { GitTagEntry } from './git-tag-entry'

/** Narrow view of the local Git working tree used by a release run. */
export interface GitClient {
  /**
   * Create an annotated tag on HEAD. Resolves `exists` when a tag with the
   * same name is already present.
   */
  createAnnotatedTag(
    name: string,
    message: string,
  ): Promise<'created' | 'exists'>

  /** Set `user.name` and `user.email` for the local repository. */
  setCommitterIdentity(name: string, email: string): Promise<void>

  /** Push a tag to `origin`, overwriting the remote one. */
  pushTag(name: string): Promise<void>

  /** First line of the HEAD commit message. */
  readHeadSubject(): Promise<string>

  /** All local tags with commit timestamps. */
  listTags(): Promise<GitTagEntry[]>
}
