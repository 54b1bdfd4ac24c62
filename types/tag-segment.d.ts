/** Kind of a non-counter tag field. */
export type TagSegmentKind = 'service' | 'branch' | 'date'

/** Single field of a composed tag. */
export interface TagSegment {
  kind: TagSegmentKind
  value: string
}
