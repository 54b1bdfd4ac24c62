import { randomUUID } from 'node:crypto'
import { appendFileSync } from 'node:fs'

import type { TagResult } from '../types/tag-result'

/**
 * Format one `GITHUB_OUTPUT` entry, switching to the heredoc form for
 * multi-line values.
 *
 * @param name - Output name.
 * @param value - Output value.
 * @returns Entry terminated by a newline.
 */
function formatOutput(name: string, value: string): string {
  if (!value.includes('\n')) {
    return `${name}=${value}\n`
  }
  let delimiter = `ghadelimiter_${randomUUID()}`
  return `${name}<<${delimiter}\n${value}\n${delimiter}\n`
}

/**
 * Append the result to the workflow output file.
 *
 * @param result - Tag result.
 * @param env - Environment variables.
 * @returns True when `GITHUB_OUTPUT` is set and the outputs were written.
 */
export function writeActionOutputs(
  result: TagResult,
  env: NodeJS.ProcessEnv,
): boolean {
  let file = env['GITHUB_OUTPUT']
  if (!file) {
    return false
  }

  appendFileSync(
    file,
    formatOutput('tag', result.tag) +
      formatOutput('commit_hash', result.commitHash) +
      formatOutput('branch', result.branch),
    'utf8',
  )
  return true
}
