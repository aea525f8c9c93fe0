import { createGitClient, type GitClient } from '../core/git.js'
import { fetchCommitDates } from '../core/history.js'
import { locateRepository, type RepoRoot } from '../core/repository.js'
import { segmentSessions } from '../core/sessions.js'
import { renderGantt, renderGanttJson, type GanttJson, type RepoReport } from '../render/gantt.js'
import { ExitCode, InvalidArgsError } from '../types/errors.js'
import type { Logger } from '../utils/logger.js'

interface ChartCommandOptions {
  repositories: readonly string[]
  title: string
  description: string
  author?: string
  everyBranch: boolean
  fuzz: number
  logger: Logger
  createGit?: (root: string) => GitClient
}

interface ChartCommandResult {
  status: 'ok'
  code: ExitCode
  text: string
  data: GanttJson
}

export async function chartCommand(options: ChartCommandOptions): Promise<ChartCommandResult> {
  const { repositories, title, description, author, everyBranch, fuzz, logger } = options
  const createGit = options.createGit ?? ((root: string) => createGitClient({ cwd: root }))

  if (repositories.length === 0) {
    throw new InvalidArgsError('at least one repository path is required')
  }
  if (!Number.isInteger(fuzz) || fuzz < 0) {
    throw new InvalidArgsError(`fuzz must be a non-negative integer, got ${fuzz}`)
  }

  // Every path is checked before any history is read.
  const roots: RepoRoot[] = []
  for (const path of repositories) {
    const repo = await locateRepository(path)
    logger.debug(`${path} -> ${repo.root}`)
    roots.push(repo)
  }

  const reports: RepoReport[] = []
  for (const repo of roots) {
    const dates = await fetchCommitDates(createGit(repo.root), { author, allBranches: everyBranch })
    if (dates.length === 0) {
      logger.info(`no matching commits in ${repo.name}, skipping`)
      continue
    }
    const sessions = segmentSessions(dates, { fuzz })
    logger.debug(`${repo.name}: ${dates.length} commit days, ${sessions.length} sessions`)
    reports.push({ name: repo.name, sessions })
  }

  const chart = { title, description }
  return {
    status: 'ok',
    code: ExitCode.OK,
    text: renderGantt(chart, reports),
    data: renderGanttJson(chart, reports),
  }
}
