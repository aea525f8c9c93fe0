import { addDays, format } from 'date-fns'
import { formatDay } from '../core/calendar.js'
import type { Session } from '../core/sessions.js'

export interface ChartOptions {
  title: string
  /** Label shown on every session bar. */
  description: string
}

export interface RepoReport {
  name: string
  sessions: readonly Session[]
}

export interface GanttJson {
  title: string
  description: string
  repositories: Array<{
    name: string
    sessions: Array<{ start: string; end: string }>
  }>
}

const INDENT = '  '

export function taskId(repoName: string, session: Session): string {
  return `dev${repoName}${format(session.start, 'yyyyMMdd')}`
}

/** Mermaid ranges are half-open, so the bar runs to the day after the last commit. */
function renderTask(description: string, repoName: string, session: Session): string {
  const start = formatDay(session.start)
  const end = formatDay(addDays(session.end, 1))
  return `${description}: ${taskId(repoName, session)}, ${start}, ${end}`
}

export function renderGantt({ title, description }: ChartOptions, reports: readonly RepoReport[]): string {
  const lines = ['gantt', `${INDENT}title ${title}`, `${INDENT}dateFormat YYYY-MM-DD`]

  for (const report of reports) {
    if (report.sessions.length === 0) {
      continue
    }
    lines.push('', `${INDENT}section ${report.name}`)
    for (const session of report.sessions) {
      lines.push(`${INDENT}${renderTask(description, report.name, session)}`)
    }
  }

  return `${lines.join('\n')}\n`
}

export function renderGanttJson({ title, description }: ChartOptions, reports: readonly RepoReport[]): GanttJson {
  return {
    title,
    description,
    repositories: reports
      .filter((report) => report.sessions.length > 0)
      .map((report) => ({
        name: report.name,
        sessions: report.sessions.map((session) => ({
          start: formatDay(session.start),
          end: formatDay(session.end),
        })),
      })),
  }
}
