import type { TagScope } from './tag-scope'

/**
 * Capabilities the tag computation needs from the repository.
 *
 * Implementations throw `SourceControlError` when the commit or ref cannot be
 * resolved and `TagQueryError` when a tag listing fails.
 */
export interface SourceControl {
  /** List tag names of the given namespace that start with `prefix`. */
  listTags(scope: TagScope, prefix: string): string[]

  /** Symbolic ref or branch name of the working tree. */
  currentRef(): string

  /** Commit hash of the working tree. */
  currentCommitHash(): string
}
