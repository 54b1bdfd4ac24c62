import type { TagCountStrategy } from '../../types/tag-count-strategy'
import type { SourceControl } from '../../types/source-control'
import type { TagScope } from '../../types/tag-scope'

import { countMatchingTags } from './count-matching-tags'

/** Namespaces in the order they are queried. */
let scopes: TagScope[] = ['remote', 'local']

/**
 * Build the remote-then-local tag count strategies.
 *
 * @param sourceControl - Repository access.
 * @returns Strategies in query order.
 */
export function createTagCountStrategies(
  sourceControl: Pick<SourceControl, 'listTags'>,
): TagCountStrategy[] {
  return scopes.map(scope => ({
    count: prefix =>
      countMatchingTags(sourceControl.listTags(scope, prefix), prefix),
    scope,
  }))
}
