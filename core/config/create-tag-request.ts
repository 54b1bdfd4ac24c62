import type { TagRequestInput } from '../../types/tag-request-input'
import type { TagRequest } from '../../types/tag-request'

import { parseBranchSeparator } from './parse-branch-separator'
import { parseBooleanInput } from './parse-boolean-input'
import { parseMaxLength } from './parse-max-length'
import { parseTagFormat } from './parse-tag-format'
import { parseRunDate } from './parse-run-date'

/**
 * Validate raw inputs and apply defaults.
 *
 * Throws `ConfigurationError` for the first invalid field, before anything
 * touches the repository.
 *
 * @param input - Raw inputs.
 * @returns Immutable tag request.
 */
export function createTagRequest(input: TagRequestInput): TagRequest {
  return Object.freeze({
    includeCounter: parseBooleanInput(
      'include_counter',
      input.includeCounter,
      true,
    ),
    branchSeparator: parseBranchSeparator(input.branchSeparator),
    pullRequestRef: (input.pullRequestRef ?? '').trim(),
    serviceName: (input.serviceName ?? '').trim(),
    maxLength: parseMaxLength(input.maxLength),
    tagFormat: parseTagFormat(input.tagFormat),
    customTag: (input.customTag ?? '').trim(),
    branchRef: (input.branchRef ?? '').trim(),
    date: parseRunDate(input.date),
  })
}
