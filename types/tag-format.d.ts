/** Supported orderings of the tag fields. */
export type TagFormat =
  | 'service-date-branch-counter'
  | 'service-branch-date-counter'
  | 'branch-date-counter'
  | 'branch-date'
  | 'date-branch'
