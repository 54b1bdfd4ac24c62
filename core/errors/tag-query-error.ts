import type { TagScope } from '../../types/tag-scope'

/** Listing the tags of a namespace failed. */
export class TagQueryError extends Error {
  public readonly scope: TagScope

  public constructor(scope: TagScope, message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'TagQueryError'
    this.scope = scope
  }
}
