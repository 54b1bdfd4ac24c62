import pc from 'picocolors'

import type { TagResult } from '../types/tag-result'

/**
 * Print the tag result.
 *
 * @param result - Tag result.
 * @param json - Print a single JSON document instead of the summary.
 */
export function printTagResult(result: TagResult, json: boolean): void {
  if (json) {
    console.info(JSON.stringify(result))
    return
  }

  console.info(`\n${pc.gray('tag:')}         ${pc.green(result.tag)}`)
  console.info(`${pc.gray('commit hash:')} ${result.commitHash}`)
  console.info(`${pc.gray('branch:')}      ${result.branch}\n`)
}
