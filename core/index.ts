export type { TagCountStrategy } from '../types/tag-count-strategy'
export type { TagRequestInput } from '../types/tag-request-input'
export type { ResolvedContext } from '../types/resolved-context'
export type { SourceControl } from '../types/source-control'
export type { ComposedTag } from '../types/composed-tag'
export type { TagRequest } from '../types/tag-request'
export type { TagFormat } from '../types/tag-format'
export type { TagResult } from '../types/tag-result'
export type { TagScope } from '../types/tag-scope'

export { createTagCountStrategies } from './counter/create-tag-count-strategies'
export { createGitSourceControl } from './git/create-git-source-control'
export { resolveNextCounter } from './counter/resolve-next-counter'
export { SourceControlError } from './errors/source-control-error'
export { ConfigurationError } from './errors/configuration-error'
export { createTagRequest } from './config/create-tag-request'
export { normalizeBranch } from './branch/normalize-branch'
export { resolveContext } from './context/resolve-context'
export { TagQueryError } from './errors/tag-query-error'
export { enforceLength } from './length/enforce-length'
export { fitSegments } from './length/fit-segments'
export { composeTag } from './compose/compose-tag'
export { generateTag } from './generate-tag'
