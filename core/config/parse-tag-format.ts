import type { TagFormat } from '../../types/tag-format'

import { ConfigurationError } from '../errors/configuration-error'
import { DEFAULT_TAG_FORMAT } from '../constants'

let formats = new Set<string>([
  'service-date-branch-counter',
  'service-branch-date-counter',
  'branch-date-counter',
  'branch-date',
  'date-branch',
] satisfies TagFormat[])

function isTagFormat(value: string): value is TagFormat {
  return formats.has(value)
}

/**
 * Parse the tag format option.
 *
 * Keywords may be joined with `-` or `_` (`branch_date_counter` is the same
 * format as `branch-date-counter`), and case is ignored.
 *
 * @param value - Raw format option.
 * @returns Canonical tag format, the default one when the value is empty.
 */
export function parseTagFormat(value: undefined | string): TagFormat {
  let normalized = (value ?? '').trim().toLowerCase().replace(/_/gu, '-')
  if (normalized === '') {
    return DEFAULT_TAG_FORMAT
  }

  if (isTagFormat(normalized)) {
    return normalized
  }

  throw new ConfigurationError(
    'tag_format',
    `Invalid tag format "${value}". Expected one of: ${[...formats].join(', ')}.`,
  )
}
