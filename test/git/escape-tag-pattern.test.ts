import { describe, expect, it } from 'vitest'

import { escapeTagPattern } from '../../core/git/escape-tag-pattern'

describe('escapeTagPattern', () => {
  it('appends a wildcard', () => {
    expect(escapeTagPattern('api_2024-01-15_main')).toBe('api_2024-01-15_main*')
  })

  it('escapes wildmatch metacharacters', () => {
    expect(escapeTagPattern('a*b?c[d]e\\f')).toBe(
      String.raw`a\*b\?c\[d]e\\f*`,
    )
  })
})
