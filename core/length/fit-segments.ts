import pc from 'picocolors'

import type { TagSegment, TagSegmentKind } from '../../types/tag-segment'

import { joinSegments } from '../compose/join-segments'
import { RESERVED_BRANCH_LENGTH } from '../constants'

/** Single truncation pass over one kind of segment. */
interface ShrinkStep {
  /** Shortest value the step may leave behind. */
  floor(value: string): number

  /** Whether cutting is reported as a warning. */
  degraded: boolean

  /**
   * Whether the step may empty a segment that is exactly as long as the
   * excess. Emptying also drops the separator and lands one under the limit.
   */
  drop: boolean

  kind: TagSegmentKind
}

/**
 * Truncation order. The branch is cut to its reserved length first, then
 * service and date give way, and only then the branch goes below its
 * reserved length.
 */
let steps: ShrinkStep[] = [
  {
    floor: value => Math.min(RESERVED_BRANCH_LENGTH, value.length),
    degraded: false,
    kind: 'branch',
    drop: false,
  },
  { kind: 'service', degraded: false, floor: () => 0, drop: false },
  { kind: 'date', degraded: false, floor: () => 0, drop: false },
  { kind: 'branch', degraded: true, floor: () => 1, drop: false },
  { kind: 'service', degraded: false, floor: () => 0, drop: true },
  { kind: 'date', degraded: false, floor: () => 0, drop: true },
]

/**
 * Shorten segments so that they and a counter of the given width fit into the
 * length limit.
 *
 * Each segment is cut from its tail. A segment cut down to nothing is dropped
 * along with its separator.
 *
 * @param segments - Non-counter segments in tag order.
 * @param counterWidth - Length of the counter appended later, null for none.
 * @param maxLength - Length limit.
 * @returns Shortened copies of the segments.
 */
export function fitSegments(
  segments: TagSegment[],
  counterWidth: number | null,
  maxLength: number,
): TagSegment[] {
  let current = segments.map(segment => ({ ...segment }))
  let counter = counterWidth === null ? null : '0'.repeat(counterWidth)
  let excess = (): number => joinSegments(current, counter).length - maxLength

  for (let step of steps) {
    for (let segment of current) {
      let over = excess()
      if (segment.kind !== step.kind || over <= 0) {
        continue
      }

      let removable = segment.value.length - step.floor(segment.value)
      let cut = Math.min(over, removable)
      if (!step.drop && cut === segment.value.length && cut === over) {
        cut -= 1
      }
      if (cut <= 0) {
        continue
      }

      if (step.degraded) {
        console.warn(
          pc.yellow(
            `⚠️  Branch shortened below ${RESERVED_BRANCH_LENGTH} characters to fit ${maxLength}`,
          ),
        )
      }
      segment.value = segment.value.slice(0, segment.value.length - cut)
    }
  }

  return current
}
