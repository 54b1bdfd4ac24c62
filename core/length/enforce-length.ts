import pc from 'picocolors'

import type { TagSegment } from '../../types/tag-segment'

import { joinSegments } from '../compose/join-segments'
import { fitSegments } from './fit-segments'

/**
 * Fit a tag into the length limit.
 *
 * The branch keeps its reserved length while service and date can still be
 * cut, and the counter is never cut. When even the counter and a single
 * branch character exceed the limit the shortest form is returned.
 *
 * @param segments - Non-counter segments in tag order.
 * @param counter - Counter appended as the last field, if any.
 * @param maxLength - Length limit.
 * @returns Tag no longer than `maxLength` whenever that is attainable.
 */
export function enforceLength(
  segments: TagSegment[],
  counter: string | null,
  maxLength: number,
): string {
  let fitted = fitSegments(segments, counter?.length ?? null, maxLength)

  let tag = joinSegments(fitted, counter)
  if (tag.length > maxLength) {
    console.warn(
      pc.yellow(
        `⚠️  Tag "${tag}" exceeds the maximum length of ${maxLength} characters`,
      ),
    )
  }
  return tag
}
