import type { ResolvedContext } from '../../types/resolved-context'
import type { SourceControl } from '../../types/source-control'
import type { TagRequest } from '../../types/tag-request'

import { resolveRawBranch } from '../branch/resolve-raw-branch'
import { normalizeBranch } from '../branch/normalize-branch'
import { formatRunDate } from './format-run-date'

/**
 * Read everything a run depends on from the repository and the clock.
 *
 * @param request - Tag request.
 * @param sourceControl - Repository access.
 * @param now - Current time, ignored when the request carries a date.
 * @returns Context of the run.
 */
export function resolveContext(
  request: TagRequest,
  sourceControl: SourceControl,
  now: Date,
): ResolvedContext {
  let commitHash = sourceControl.currentCommitHash()
  let rawBranch = resolveRawBranch(request, sourceControl)

  return Object.freeze({
    normalizedBranch: normalizeBranch(rawBranch, request.branchSeparator),
    date: request.date ?? formatRunDate(now),
    commitHash,
    rawBranch,
  })
}
