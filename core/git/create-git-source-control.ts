import type { SourceControl } from '../../types/source-control'

import { SourceControlError } from '../errors/source-control-error'
import { ConfigurationError } from '../errors/configuration-error'
import { describeGitFailure } from './describe-git-failure'
import { parseLsRemoteTags } from './parse-ls-remote-tags'
import { TagQueryError } from '../errors/tag-query-error'
import { escapeTagPattern } from './escape-tag-pattern'
import { DEFAULT_REMOTE } from '../constants'
import { runGit } from './run-git'

/** Options of the git-backed source control. */
interface GitSourceControlOptions {
  /** Remote queried for tags. */
  remote?: string

  /** Repository directory. */
  cwd: string
}

/**
 * Create a source control backed by the `git` executable.
 *
 * @param options - Repository directory and remote name.
 * @returns Source control bound to the repository.
 */
export function createGitSourceControl(
  options: GitSourceControlOptions,
): SourceControl {
  let { remote = DEFAULT_REMOTE, cwd } = options
  let remoteName = remote.trim()
  if (remoteName === '') {
    throw new ConfigurationError('remote', 'Remote name must not be empty.')
  }

  return {
    listTags: (scope, prefix) => {
      let pattern = escapeTagPattern(prefix)
      try {
        if (scope === 'remote') {
          return parseLsRemoteTags(
            runGit(
              ['ls-remote', '--tags', '--refs', remoteName, `refs/tags/${pattern}`],
              cwd,
            ),
          )
        }
        return runGit(['tag', '--list', pattern], cwd)
          .split(/\r?\n/u)
          .map(line => line.trim())
          .filter(Boolean)
      } catch (error) {
        throw new TagQueryError(
          scope,
          `Listing ${scope} tags failed: ${describeGitFailure(error)}`,
          { cause: error },
        )
      }
    },
    currentCommitHash: () => {
      try {
        return runGit(['rev-parse', 'HEAD'], cwd)
      } catch (error) {
        throw new SourceControlError(
          'commit-hash',
          `Unable to resolve the current commit: ${describeGitFailure(error)}`,
          { cause: error },
        )
      }
    },
    currentRef: () => {
      try {
        return runGit(['symbolic-ref', '--quiet', 'HEAD'], cwd)
      } catch (error) {
        throw new SourceControlError(
          'current-ref',
          `Unable to resolve the current branch, HEAD may be detached: ${describeGitFailure(error)}`,
          { cause: error },
        )
      }
    },
  }
}
