import { describe, expect, it } from 'vitest'
import { formatDay } from '../../../src/core/calendar.js'
import { GitError } from '../../../src/core/git.js'
import { buildLogArgs, fetchCommitDates, parseCommitDates } from '../../../src/core/history.js'
import { HistoryFetchFailedError } from '../../../src/types/errors.js'
import { createFakeGit } from '../mocks.js'

const LOG_ARGS = ['log', '--pretty=format:%ad', '--date=short']

describe('buildLogArgs', () => {
  it('reads short author dates from HEAD by default', () => {
    expect(buildLogArgs({ allBranches: false })).toEqual(LOG_ARGS)
  })

  it('adds the branch and author filters', () => {
    expect(buildLogArgs({ allBranches: true, author: 'Jane Doe' })).toEqual([
      ...LOG_ARGS,
      '--all',
      '--author=Jane Doe',
    ])
  })
})

describe('parseCommitDates', () => {
  it('deduplicates and sorts the days', () => {
    const dates = parseCommitDates('2024-01-08\n2024-01-05\n2024-01-08\n\n2024-01-02')
    expect(dates.map(formatDay)).toEqual(['2024-01-02', '2024-01-05', '2024-01-08'])
  })

  it('returns nothing for empty output', () => {
    expect(parseCommitDates('')).toEqual([])
  })
})

describe('fetchCommitDates', () => {
  it('runs git log after checking HEAD', async () => {
    const git = createFakeGit('/repo', { log: '2024-01-03\n2024-01-02\n2024-01-02' })
    const dates = await fetchCommitDates(git, { allBranches: false, author: 'Ada' })
    expect(dates.map(formatDay)).toEqual(['2024-01-02', '2024-01-03'])
    expect(git.exec).toHaveBeenCalledTimes(2)
    expect(git.exec).toHaveBeenNthCalledWith(1, ['rev-parse', '--verify', '--quiet', 'HEAD'])
    expect(git.exec).toHaveBeenNthCalledWith(2, [...LOG_ARGS, '--author=Ada'])
  })

  it('returns no dates for an unborn branch', async () => {
    const git = createFakeGit('/repo', {
      'rev-parse': new GitError(['rev-parse', '--verify', '--quiet', 'HEAD'], 1, '', ''),
    })
    await expect(fetchCommitDates(git, { allBranches: false })).resolves.toEqual([])
    expect(git.exec).toHaveBeenCalledTimes(1)
  })

  it('reports a HEAD check that fails for another reason', async () => {
    const git = createFakeGit('/repo', {
      'rev-parse': new GitError(['rev-parse', '--verify', '--quiet', 'HEAD'], 128, '', 'fatal: not a git repository'),
    })
    const failure = fetchCommitDates(git, { allBranches: false })
    await expect(failure).rejects.toBeInstanceOf(HistoryFetchFailedError)
    await expect(failure).rejects.toThrow('failed to read history of /repo: fatal: not a git repository')
    expect(git.exec).toHaveBeenCalledTimes(1)
  })

  it('skips the HEAD check when reading every branch', async () => {
    const git = createFakeGit('/repo', { log: '2024-01-02' })
    await fetchCommitDates(git, { allBranches: true })
    expect(git.exec).toHaveBeenCalledTimes(1)
    expect(git.exec).toHaveBeenCalledWith([...LOG_ARGS, '--all'])
  })

  it('reports a failing git log', async () => {
    const git = createFakeGit('/repo', {
      log: new GitError(LOG_ARGS, 128, '', 'fatal: bad revision'),
    })
    const failure = fetchCommitDates(git, { allBranches: false })
    await expect(failure).rejects.toBeInstanceOf(HistoryFetchFailedError)
    await expect(failure).rejects.toThrow('failed to read history of /repo: fatal: bad revision')
  })

  it('reports git that could not be started', async () => {
    const git = createFakeGit('/repo', {
      'rev-parse': new GitError(['rev-parse'], null, '', 'spawn git ENOENT'),
    })
    await expect(fetchCommitDates(git, { allBranches: false })).rejects.toThrow(
      'failed to read history of /repo: spawn git ENOENT',
    )
  })
})
