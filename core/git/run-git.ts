import { execFileSync } from 'node:child_process'

/**
 * Run a git command and return its trimmed standard output.
 *
 * @param args - Git arguments.
 * @param cwd - Repository directory.
 * @returns Command output.
 */
export function runGit(args: string[], cwd: string): string {
  let output = execFileSync('git', args, {
    stdio: ['ignore', 'pipe', 'pipe'],
    encoding: 'utf8',
    cwd,
  })
  return output.trim()
}
