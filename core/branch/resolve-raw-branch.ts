import type { SourceControl } from '../../types/source-control'
import type { TagRequest } from '../../types/tag-request'

import { SourceControlError } from '../errors/source-control-error'
import { stripRefPrefix } from './strip-ref-prefix'

/**
 * Pick the branch the tag is computed for.
 *
 * The pull request ref wins over the branch ref and is used as given. When
 * neither is given the ref of the working tree is used; branch and working
 * tree refs lose their ref namespace.
 *
 * @param request - Tag request.
 * @param sourceControl - Repository access.
 * @returns Branch name.
 */
export function resolveRawBranch(
  request: Pick<TagRequest, 'pullRequestRef' | 'branchRef'>,
  sourceControl: Pick<SourceControl, 'currentRef'>,
): string {
  if (request.pullRequestRef !== '') {
    return request.pullRequestRef
  }

  let reference = request.branchRef || sourceControl.currentRef()
  let branch = stripRefPrefix(reference)
  if (branch === '') {
    throw new SourceControlError(
      'current-ref',
      `Unable to derive a branch name from ref "${reference}"`,
    )
  }

  return branch
}
