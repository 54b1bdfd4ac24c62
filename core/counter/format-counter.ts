import { COUNTER_WIDTH } from '../constants'

/**
 * Format a counter value, zero-padded to two digits.
 *
 * @param value - Non-negative counter.
 * @returns Counter text (`00`, `07`, `42`, `100`).
 */
export function formatCounter(value: number): string {
  return String(value).padStart(COUNTER_WIDTH, '0')
}
