/**
 * Format a point in time as its UTC calendar day.
 *
 * @param now - Point in time.
 * @returns Date as `YYYY-MM-DD`.
 */
export function formatRunDate(now: Date): string {
  return now.toISOString().slice(0, 10)
}
