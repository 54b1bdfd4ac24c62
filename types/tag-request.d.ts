import type { TagFormat } from './tag-format'

/** Validated input of a single tag computation. */
export interface TagRequest {
  /** Literal tag that bypasses composition when non-empty. */
  customTag: string

  /** Service name prepended to the tag, omitted when empty. */
  serviceName: string

  /** Character substituted for `/`, `:`, `@` and `#` in branch names. */
  branchSeparator: string

  /** Pull request head ref, takes precedence over `branchRef`. */
  pullRequestRef: string

  /** Whether `*-counter` formats append a counter. */
  includeCounter: boolean

  /** Field ordering. */
  tagFormat: TagFormat

  /** Branch or ref of the build, may be empty. */
  branchRef: string

  /** Upper bound for the tag length. */
  maxLength: number

  /** Run date (`YYYY-MM-DD`), null to use the current date. */
  date: string | null
}
