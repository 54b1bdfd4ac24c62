import { ConfigurationError } from '../errors/configuration-error'

/**
 * Parse an explicit run date.
 *
 * @param value - Raw date.
 * @returns The date when it is a valid `YYYY-MM-DD` calendar day, null when
 *   the value is empty.
 */
export function parseRunDate(value: undefined | string): string | null {
  let text = (value ?? '').trim()
  if (text === '') {
    return null
  }

  let match = text.match(/^(?<year>\d{4})-(?<month>\d{2})-(?<day>\d{2})$/u)
  if (match?.groups) {
    let { month, year, day } = match.groups
    let date = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)))
    if (date.toISOString().slice(0, 10) === text) {
      return text
    }
  }

  throw new ConfigurationError(
    'date',
    `Invalid date "${text}". Expected a calendar date as YYYY-MM-DD.`,
  )
}
