import type { TagRequestInput } from '../types/tag-request-input'

import { readActionInput } from './read-action-input'
import { readRawOption } from './read-raw-option'

/**
 * Merge command line flags, workflow inputs and workflow context variables.
 * Flags take precedence over inputs, inputs over context variables.
 *
 * @param args - Raw command line arguments.
 * @param env - Environment variables.
 * @returns Unvalidated tag request input.
 */
export function collectTagInput(
  args: string[],
  env: NodeJS.ProcessEnv,
): TagRequestInput {
  let read = (flag: string, input: string): undefined | string => {
    let value = readRawOption(args, flag)
    return value === undefined || value === '' ?
        readActionInput(input, env)
      : value
  }

  return {
    pullRequestRef:
      read('--pull-request-ref', 'pull_request_ref') ??
      env['GITHUB_HEAD_REF'],
    branchRef: read('--branch-ref', 'branch_ref') ?? env['GITHUB_REF'],
    branchSeparator: read('--branch-separator', 'branch_separator'),
    includeCounter: read('--include-counter', 'include_counter'),
    serviceName: read('--service-name', 'service_name'),
    maxLength: read('--max-length', 'max_length'),
    tagFormat: read('--tag-format', 'tag_format'),
    customTag: read('--custom-tag', 'custom_tag'),
    date: read('--date', 'date'),
  }
}
