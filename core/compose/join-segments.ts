import type { TagSegment } from '../../types/tag-segment'

import { FIELD_SEPARATOR } from '../constants'

/**
 * Join segment values with the field separator, skipping empty ones.
 *
 * @param segments - Tag segments.
 * @param counter - Counter appended as the last field, if any.
 * @returns Joined tag.
 */
export function joinSegments(
  segments: TagSegment[],
  counter: string | null = null,
): string {
  let values = segments
    .map(segment => segment.value)
    .filter(value => value !== '')
  if (counter !== null) {
    values.push(counter)
  }
  return values.join(FIELD_SEPARATOR)
}
