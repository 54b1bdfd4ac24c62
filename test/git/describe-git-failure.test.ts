import { describe, expect, it } from 'vitest'

import { describeGitFailure } from '../../core/git/describe-git-failure'

describe('describeGitFailure', () => {
  it('uses the last stderr line', () => {
    let error = Object.assign(new Error('Command failed: git ls-remote'), {
      stderr: 'warning: something\nfatal: could not read from remote\n',
    })

    expect(describeGitFailure(error)).toBe('fatal: could not read from remote')
  })

  it('falls back to the error message', () => {
    expect(describeGitFailure(new Error('spawn git ENOENT'))).toBe(
      'spawn git ENOENT',
    )
  })

  it('stringifies non-errors', () => {
    expect(describeGitFailure('boom')).toBe('boom')
  })
})
