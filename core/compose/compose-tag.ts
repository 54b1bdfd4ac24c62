import type { TagSegment, TagSegmentKind } from '../../types/tag-segment'
import type { ComposedTag } from '../../types/composed-tag'
import type { TagFormat } from '../../types/tag-format'

import { getFormatFields } from './get-format-fields'
import { joinSegments } from './join-segments'

/** Field values of a tag. */
interface ComposeFields {
  service: string
  branch: string
  date: string
}

/**
 * Assemble the tag fields in the order of the format.
 *
 * An empty service is left out together with its separator. The counter slot
 * is only opened for `*-counter` formats with `includeCounter` set.
 *
 * @param format - Tag format.
 * @param fields - Service, date and branch values.
 * @param includeCounter - Whether a counter is requested.
 * @returns Segments, joined prefix and counter flag.
 */
export function composeTag(
  format: TagFormat,
  fields: ComposeFields,
  includeCounter: boolean,
): ComposedTag {
  let layout = getFormatFields(format)

  let segments: TagSegment[] = layout.fields
    .map((kind: TagSegmentKind) => ({ value: fields[kind], kind }))
    .filter(segment => segment.value !== '')

  return {
    hasCounterSlot: layout.counter && includeCounter,
    prefix: joinSegments(segments),
    segments,
  }
}
