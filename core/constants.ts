import type { TagFormat } from '../types/tag-format'

/** Tag length accepted by registries and Kubernetes label values. */
export const DEFAULT_MAX_LENGTH = 63

export const DEFAULT_TAG_FORMAT: TagFormat = 'service-date-branch-counter'

export const DEFAULT_BRANCH_SEPARATOR = '-'

export const DEFAULT_REMOTE = 'origin'

/** Separator between tag fields. */
export const FIELD_SEPARATOR = '_'

/** Branch characters that are replaced with the branch separator. */
export const SPECIAL_BRANCH_CHARACTERS = ['/', ':', '@', '#'] as const

/** Branch length kept before service and date are exhausted. */
export const RESERVED_BRANCH_LENGTH = 10

/** Minimum number of counter digits. */
export const COUNTER_WIDTH = 2
