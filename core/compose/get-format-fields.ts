import type { TagSegmentKind } from '../../types/tag-segment'
import type { TagFormat } from '../../types/tag-format'

/** Field order of a format and whether it takes a counter. */
interface FormatFields {
  fields: TagSegmentKind[]
  counter: boolean
}

let layouts: Record<TagFormat, FormatFields> = {
  'service-date-branch-counter': {
    fields: ['service', 'date', 'branch'],
    counter: true,
  },
  'service-branch-date-counter': {
    fields: ['service', 'branch', 'date'],
    counter: true,
  },
  'branch-date-counter': {
    fields: ['branch', 'date'],
    counter: true,
  },
  'branch-date': {
    fields: ['branch', 'date'],
    counter: false,
  },
  'date-branch': {
    fields: ['date', 'branch'],
    counter: false,
  },
}

/**
 * Look up the field order of a tag format.
 *
 * @param format - Tag format.
 * @returns Ordered field kinds and the counter flag.
 */
export function getFormatFields(format: TagFormat): FormatFields {
  return layouts[format]
}
