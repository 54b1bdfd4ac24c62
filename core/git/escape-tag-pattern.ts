/**
 * Turn a literal prefix into a git wildmatch pattern matching every name that
 * starts with it.
 *
 * @param prefix - Literal tag prefix.
 * @returns Pattern with `*`, `?`, `[` and `\` escaped and a trailing `*`.
 */
export function escapeTagPattern(prefix: string): string {
  return `${prefix.replace(/[*?[\\]/gu, String.raw`\$&`)}*`
}
