import { ConfigurationError } from '../errors/configuration-error'
import { DEFAULT_MAX_LENGTH } from '../constants'

/**
 * Parse the maximum tag length.
 *
 * @param value - Raw value, numeric or textual.
 * @returns Positive integer, the default length when the value is empty.
 */
export function parseMaxLength(value: undefined | number | string): number {
  if (value === undefined) {
    return DEFAULT_MAX_LENGTH
  }

  let text = String(value).trim()
  if (text === '') {
    return DEFAULT_MAX_LENGTH
  }

  let parsed = /^\d+$/u.test(text) ? Number(text) : Number.NaN
  if (!Number.isSafeInteger(parsed) || parsed <= 0) {
    throw new ConfigurationError(
      'max_length',
      `Invalid max length "${text}". Expected a positive integer.`,
    )
  }

  return parsed
}
