import type { TagScope } from './tag-scope'

/**
 * Counts the existing tags that share a prefix. Throws `TagQueryError` when
 * the namespace cannot be queried.
 */
export interface TagCountStrategy {
  count(prefix: string): number
  scope: TagScope
}
