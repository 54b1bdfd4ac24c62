import { ConfigurationError } from '../errors/configuration-error'
import { DEFAULT_BRANCH_SEPARATOR } from '../constants'

/**
 * Parse the branch separator.
 *
 * @param value - Raw separator.
 * @returns Single character, `-` when the value is empty.
 */
export function parseBranchSeparator(value: undefined | string): string {
  if (value === undefined || value === '') {
    return DEFAULT_BRANCH_SEPARATOR
  }

  if (Array.from(value).length !== 1) {
    throw new ConfigurationError(
      'branch_separator',
      `Invalid branch separator "${value}". Expected a single character.`,
    )
  }

  return value
}
