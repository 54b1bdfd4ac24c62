import type { TagSegment } from './tag-segment'

/** Tag assembled from its fields, before the counter is resolved. */
export interface ComposedTag {
  /** Whether a counter has to be appended. */
  hasCounterSlot: boolean

  /** Ordered, non-empty fields. */
  segments: TagSegment[]

  /** Fields joined with `_`. */
  prefix: string
}
