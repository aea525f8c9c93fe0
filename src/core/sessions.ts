import { type CommitDate, DEFAULT_WORK_WEEK, isNextWorkingDay, type WorkWeek } from './calendar.js'

export interface Session {
  readonly start: CommitDate
  readonly end: CommitDate
}

export interface SegmentOptions {
  fuzz: number
  workWeek?: WorkWeek
}

/**
 * Splits ascending, distinct commit dates into runs of consecutive working
 * days. A date opens a new session when it falls outside the previous date's
 * `nextWorkingDays` window.
 */
export function segmentSessions(
  dates: readonly CommitDate[],
  { fuzz, workWeek = DEFAULT_WORK_WEEK }: SegmentOptions,
): Session[] {
  if (dates.length === 0) {
    return []
  }

  let sessionStart = dates[0]
  // Map keeps insertion order, which is ascending start order here.
  const ends = new Map<CommitDate, CommitDate>([[sessionStart, sessionStart]])

  for (let index = 1; index < dates.length; index++) {
    const yesterday = dates[index - 1]
    const today = dates[index]
    if (!isNextWorkingDay(yesterday, today, fuzz, workWeek)) {
      sessionStart = today
    }
    ends.set(sessionStart, today)
  }

  return Array.from(ends, ([start, end]) => ({ start, end }))
}
