/** Source-control lookup that failed. */
export type SourceControlOperation = 'commit-hash' | 'current-ref'
