import type { TagSegment } from '../../types/tag-segment'

import { describe, expect, it } from 'vitest'

import { fitSegments } from '../../core/length/fit-segments'

describe('fitSegments', () => {
  let segments: TagSegment[] = [
    { value: 'api-gateway', kind: 'service' },
    { value: '2024-01-15', kind: 'date' },
    {
      value: 'feature-JIRA-1234-implement-the-new-oauth-login-flow',
      kind: 'branch',
    },
  ]

  it('leaves room for a counter of the given width', () => {
    expect(fitSegments(segments, 2, 63)).toEqual([
      { value: 'api-gateway', kind: 'service' },
      { value: '2024-01-15', kind: 'date' },
      { value: 'feature-JIRA-1234-implement-the-new-o', kind: 'branch' },
    ])
  })

  it('uses the whole limit without a counter', () => {
    let fitted = fitSegments(segments, null, 63)

    expect(fitted[2]).toEqual({
      value: 'feature-JIRA-1234-implement-the-new-oaut',
      kind: 'branch',
    })
  })

  it('returns copies and leaves the input untouched', () => {
    let fitted = fitSegments(segments, 2, 40)

    expect(fitted).not.toBe(segments)
    expect(segments.at(2)?.value).toBe(
      'feature-JIRA-1234-implement-the-new-oauth-login-flow',
    )
  })

  it('returns equal segments when they fit', () => {
    let short: TagSegment[] = [{ kind: 'branch', value: 'main' }]

    expect(fitSegments(short, 2, 63)).toEqual(short)
  })
})
