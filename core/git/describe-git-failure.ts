/**
 * Extract a one-line reason from a failed git invocation.
 *
 * @param error - Value thrown by the child process call.
 * @returns Last non-empty line of stderr, or the error message.
 */
export function describeGitFailure(error: unknown): string {
  if (!(error instanceof Error)) {
    return String(error)
  }

  let stderr =
    'stderr' in error && typeof error.stderr === 'string' ? error.stderr : ''
  let lines = stderr
    .split(/\r?\n/u)
    .map(line => line.trim())
    .filter(Boolean)

  return lines.at(-1) ?? error.message
}
