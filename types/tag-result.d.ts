/** Output of a tag computation. */
export interface TagResult {
  /** Commit the tag was computed for. */
  commitHash: string

  /** Normalized branch, also when a custom tag was used. */
  branch: string

  /** Final tag. */
  tag: string
}
