import { describe, expect, it } from 'vitest'

import { ConfigurationError } from '../../core/errors/configuration-error'
import { parseMaxLength } from '../../core/config/parse-max-length'

describe('parseMaxLength', () => {
  it('defaults to 63', () => {
    expect(parseMaxLength(undefined)).toBe(63)
    expect(parseMaxLength('')).toBe(63)
  })

  it('parses numeric strings', () => {
    expect(parseMaxLength('20')).toBe(20)
    expect(parseMaxLength(' 128 ')).toBe(128)
  })

  it('accepts positive integers', () => {
    expect(parseMaxLength(40)).toBe(40)
  })

  it.each(['0', '-5', '1.5', 'abc', '12abc'])('rejects "%s"', value => {
    expect(() => parseMaxLength(value)).toThrowError(ConfigurationError)
  })

  it('rejects non-integer numbers', () => {
    expect(() => parseMaxLength(2.5)).toThrowError(
      'Invalid max length "2.5". Expected a positive integer.',
    )
  })
})
