/**
 * Raw, unvalidated values as received from the invocation shell. Empty
 * strings and undefined both mean "use the default".
 */
export interface TagRequestInput {
  includeCounter?: boolean | string
  maxLength?: number | string
  branchSeparator?: string
  pullRequestRef?: string
  serviceName?: string
  customTag?: string
  tagFormat?: string
  branchRef?: string
  date?: string
}
