import { beforeEach, describe, expect, it, vi } from 'vitest'
import { execFileSync } from 'node:child_process'

import { createGitSourceControl } from '../../core/git/create-git-source-control'
import { SourceControlError } from '../../core/errors/source-control-error'
import { ConfigurationError } from '../../core/errors/configuration-error'
import { TagQueryError } from '../../core/errors/tag-query-error'

vi.mock(import('node:child_process'), () => ({
  execFileSync: vi.fn(),
}))

function gitFailure(stderr: string): Error {
  return Object.assign(new Error('Command failed'), { stderr })
}

describe('createGitSourceControl', () => {
  beforeEach(() => {
    vi.clearAllMocks()
  })

  it('reads the commit hash', () => {
    vi.mocked(execFileSync).mockReturnValue('0123abcd\n')

    let sourceControl = createGitSourceControl({ cwd: '/repo' })

    expect(sourceControl.currentCommitHash()).toBe('0123abcd')
    expect(execFileSync).toHaveBeenCalledWith('git', ['rev-parse', 'HEAD'], {
      stdio: ['ignore', 'pipe', 'pipe'],
      encoding: 'utf8',
      cwd: '/repo',
    })
  })

  it('wraps commit hash failures', () => {
    vi.mocked(execFileSync).mockImplementation(() => {
      throw gitFailure('fatal: not a git repository\n')
    })

    let sourceControl = createGitSourceControl({ cwd: '/tmp' })

    expect(() => sourceControl.currentCommitHash()).toThrowError(
      new SourceControlError(
        'commit-hash',
        'Unable to resolve the current commit: fatal: not a git repository',
      ),
    )
  })

  it('reads the symbolic ref of HEAD', () => {
    vi.mocked(execFileSync).mockReturnValue('refs/heads/main\n')

    let sourceControl = createGitSourceControl({ cwd: '/repo' })

    expect(sourceControl.currentRef()).toBe('refs/heads/main')
    expect(execFileSync).toHaveBeenCalledWith(
      'git',
      ['symbolic-ref', '--quiet', 'HEAD'],
      expect.objectContaining({ cwd: '/repo' }),
    )
  })

  it('reports a detached HEAD as a source control error', () => {
    vi.mocked(execFileSync).mockImplementation(() => {
      throw gitFailure('')
    })

    let sourceControl = createGitSourceControl({ cwd: '/repo' })

    let error: unknown
    try {
      sourceControl.currentRef()
    } catch (caught) {
      error = caught
    }

    expect(error).toBeInstanceOf(SourceControlError)
    expect(error).toHaveProperty('operation', 'current-ref')
    expect(error).toHaveProperty(
      'message',
      'Unable to resolve the current branch, HEAD may be detached: Command failed',
    )
  })

  it('lists remote tags through ls-remote', () => {
    vi.mocked(execFileSync).mockReturnValue(
      'aaa\trefs/tags/main_00\nbbb\trefs/tags/main_01\n',
    )

    let sourceControl = createGitSourceControl({ cwd: '/repo' })

    expect(sourceControl.listTags('remote', 'main')).toEqual([
      'main_00',
      'main_01',
    ])
    expect(execFileSync).toHaveBeenCalledWith(
      'git',
      ['ls-remote', '--tags', '--refs', 'origin', 'refs/tags/main*'],
      expect.objectContaining({ cwd: '/repo' }),
    )
  })

  it('queries the configured remote', () => {
    vi.mocked(execFileSync).mockReturnValue('')

    let sourceControl = createGitSourceControl({
      remote: ' upstream ',
      cwd: '/repo',
    })

    expect(sourceControl.listTags('remote', 'main')).toEqual([])
    expect(execFileSync).toHaveBeenCalledWith(
      'git',
      ['ls-remote', '--tags', '--refs', 'upstream', 'refs/tags/main*'],
      expect.objectContaining({ cwd: '/repo' }),
    )
  })

  it('lists local tags', () => {
    vi.mocked(execFileSync).mockReturnValue('main_00\nmain_01\n')

    let sourceControl = createGitSourceControl({ cwd: '/repo' })

    expect(sourceControl.listTags('local', 'main')).toEqual([
      'main_00',
      'main_01',
    ])
    expect(execFileSync).toHaveBeenCalledWith(
      'git',
      ['tag', '--list', 'main*'],
      expect.objectContaining({ cwd: '/repo' }),
    )
  })

  it('returns no local tags for empty output', () => {
    vi.mocked(execFileSync).mockReturnValue('')

    let sourceControl = createGitSourceControl({ cwd: '/repo' })

    expect(sourceControl.listTags('local', 'main')).toEqual([])
  })

  it('wraps listing failures in a tag query error', () => {
    vi.mocked(execFileSync).mockImplementation(() => {
      throw gitFailure(
        "fatal: 'origin' does not appear to be a git repository\n",
      )
    })

    let sourceControl = createGitSourceControl({ cwd: '/repo' })

    let error: unknown
    try {
      sourceControl.listTags('remote', 'main')
    } catch (caught) {
      error = caught
    }

    expect(error).toBeInstanceOf(TagQueryError)
    expect(error).toHaveProperty('scope', 'remote')
    expect(error).toHaveProperty(
      'message',
      "Listing remote tags failed: fatal: 'origin' does not appear to be a git repository",
    )
  })

  it('rejects an empty remote name', () => {
    expect(() => createGitSourceControl({ remote: ' ', cwd: '/repo' })).toThrowError(
      ConfigurationError,
    )
  })
})
