/** Values derived once at the start of a run. */
export interface ResolvedContext {
  /** Raw branch with the separator substitutions applied. */
  normalizedBranch: string

  /** Commit the build runs against. */
  commitHash: string

  /** Pull request ref or branch ref, ref prefix stripped. */
  rawBranch: string

  /** Run date, `YYYY-MM-DD`. */
  date: string
}
