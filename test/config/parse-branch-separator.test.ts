import { describe, expect, it } from 'vitest'

import { parseBranchSeparator } from '../../core/config/parse-branch-separator'
import { ConfigurationError } from '../../core/errors/configuration-error'

describe('parseBranchSeparator', () => {
  it('defaults to a dash', () => {
    expect(parseBranchSeparator(undefined)).toBe('-')
    expect(parseBranchSeparator('')).toBe('-')
  })

  it('accepts a single character', () => {
    expect(parseBranchSeparator('.')).toBe('.')
  })

  it('rejects longer separators', () => {
    expect(() => parseBranchSeparator('--')).toThrowError(ConfigurationError)
    expect(() => parseBranchSeparator('--')).toThrowError(
      'Invalid branch separator "--". Expected a single character.',
    )
  })
})
