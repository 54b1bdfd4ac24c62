import pc from 'picocolors'

import type { TagCountStrategy } from '../../types/tag-count-strategy'

import { TagQueryError } from '../errors/tag-query-error'
import { formatCounter } from './format-counter'

/**
 * Determine the next free counter for a prefix.
 *
 * Strategies are tried in order and the first one that answers wins. A
 * strategy failing with `TagQueryError` is skipped with a warning; when all of
 * them fail the count is zero. The lookup does not reserve anything, so two
 * runs racing on the same prefix can pick the same counter.
 *
 * @param prefix - Tag without counter.
 * @param strategies - Ordered tag count strategies.
 * @returns Zero-padded counter.
 */
export function resolveNextCounter(
  prefix: string,
  strategies: TagCountStrategy[],
): string {
  for (let strategy of strategies) {
    try {
      return formatCounter(strategy.count(prefix))
    } catch (error) {
      if (!(error instanceof TagQueryError)) {
        throw error
      }
      console.warn(
        pc.yellow(
          `⚠️  Unable to list ${strategy.scope} tags: ${error.message}`,
        ),
      )
    }
  }

  console.warn(
    pc.yellow(
      `⚠️  No tag namespace could be queried, using counter ${formatCounter(0)}`,
    ),
  )
  return formatCounter(0)
}
