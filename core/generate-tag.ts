import type { SourceControl } from '../types/source-control'
import type { TagRequest } from '../types/tag-request'
import type { TagResult } from '../types/tag-result'

import { createTagCountStrategies } from './counter/create-tag-count-strategies'
import { resolveNextCounter } from './counter/resolve-next-counter'
import { resolveContext } from './context/resolve-context'
import { enforceLength } from './length/enforce-length'
import { joinSegments } from './compose/join-segments'
import { fitSegments } from './length/fit-segments'
import { composeTag } from './compose/compose-tag'
import { COUNTER_WIDTH } from './constants'

/** Collaborators of a tag computation. */
interface GenerateTagOptions {
  sourceControl: SourceControl

  /** Current time, defaults to the system clock. */
  now?: Date
}

/**
 * Compute the image tag for a build.
 *
 * The branch is normalized, the fields are composed in the requested order
 * and cut to the length limit with room for a counter, and the next free
 * counter for that cut prefix is appended when the format has one. A custom
 * tag skips all of that and is returned as given.
 *
 * @param request - Validated tag request.
 * @param options - Source control and clock.
 * @returns Tag, commit hash and normalized branch.
 */
export function generateTag(
  request: TagRequest,
  options: GenerateTagOptions,
): TagResult {
  let { now = new Date(), sourceControl } = options
  let context = resolveContext(request, sourceControl, now)

  if (request.customTag !== '') {
    return {
      branch: context.normalizedBranch,
      commitHash: context.commitHash,
      tag: request.customTag,
    }
  }

  let composed = composeTag(
    request.tagFormat,
    {
      branch: context.normalizedBranch,
      service: request.serviceName,
      date: context.date,
    },
    request.includeCounter,
  )

  let fitted = fitSegments(
    composed.segments,
    composed.hasCounterSlot ? COUNTER_WIDTH : null,
    request.maxLength,
  )

  let counter =
    composed.hasCounterSlot ?
      resolveNextCounter(
        joinSegments(fitted),
        createTagCountStrategies(sourceControl),
      )
    : null

  return {
    tag: enforceLength(fitted, counter, request.maxLength),
    branch: context.normalizedBranch,
    commitHash: context.commitHash,
  }
}
