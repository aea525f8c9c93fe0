import { compareAsc } from 'date-fns'
import { HistoryFetchFailedError } from '../types/errors.js'
import { type CommitDate, formatDay, parseDay } from './calendar.js'
import { type GitClient, GitError } from './git.js'

export interface HistoryFilter {
  /** Passed to `git log --author` as given. */
  author?: string
  /** Walk every ref instead of only HEAD. */
  allBranches: boolean
}

export function buildLogArgs({ author, allBranches }: HistoryFilter): string[] {
  const args = ['log', '--pretty=format:%ad', '--date=short']
  if (allBranches) {
    args.push('--all')
  }
  if (author) {
    args.push(`--author=${author}`)
  }
  return args
}

/** Turns `git log` date lines into distinct days in ascending order. */
export function parseCommitDates(output: string): CommitDate[] {
  const byDay = new Map<string, CommitDate>()
  for (const line of output.split('\n')) {
    const day = parseDay(line)
    if (day) {
      byDay.set(formatDay(day), day)
    }
  }
  return Array.from(byDay.values()).sort(compareAsc)
}

async function hasHead(git: GitClient): Promise<boolean> {
  try {
    await git.exec(['rev-parse', '--verify', '--quiet', 'HEAD'])
    return true
  } catch (error) {
    // `--verify --quiet` exits 1 for a missing ref: an unborn branch
    if (error instanceof GitError && error.exitCode === 1) {
      return false
    }
    throw error
  }
}

export async function fetchCommitDates(git: GitClient, filter: HistoryFilter): Promise<CommitDate[]> {
  try {
    if (!filter.allBranches && !(await hasHead(git))) {
      return []
    }
    const { stdout } = await git.exec(buildLogArgs(filter))
    return parseCommitDates(stdout)
  } catch (error) {
    if (error instanceof GitError) {
      throw new HistoryFetchFailedError(git.cwd, error.stderr || error.message)
    }
    throw error
  }
}
