import { addDays, differenceInCalendarDays, format, getDay, isValid, parseISO } from 'date-fns'

/** A calendar day with at least one commit, held as local midnight. */
export type CommitDate = Date

/** 0 is Sunday, as returned by date-fns `getDay`. */
export type Weekday = 0 | 1 | 2 | 3 | 4 | 5 | 6

/**
 * Number of calendar days, per weekday, that still count as the next working
 * day. Friday's window reaches over the weekend to Monday.
 */
export type WorkWeek = Readonly<Record<Weekday, number>>

export const DEFAULT_WORK_WEEK: WorkWeek = {
  0: 1,
  1: 1,
  2: 1,
  3: 1,
  4: 1,
  5: 3,
  6: 2,
}

const WEEKDAYS: readonly Weekday[] = [0, 1, 2, 3, 4, 5, 6]

export function weekdayOf(day: CommitDate): Weekday {
  return WEEKDAYS[getDay(day)]
}

function assertFuzz(fuzz: number): void {
  if (!Number.isInteger(fuzz) || fuzz < 0) {
    throw new RangeError(`fuzz must be a non-negative integer, got ${fuzz}`)
  }
}

function windowSpan(day: CommitDate, fuzz: number, workWeek: WorkWeek): number {
  assertFuzz(fuzz)
  return workWeek[weekdayOf(day)] + fuzz
}

export function nextWorkingDays(
  day: CommitDate,
  fuzz: number,
  workWeek: WorkWeek = DEFAULT_WORK_WEEK,
): CommitDate[] {
  const span = windowSpan(day, fuzz, workWeek)
  const days: CommitDate[] = []
  for (let offset = 1; offset <= span; offset++) {
    days.push(addDays(day, offset))
  }
  return days
}

/** Same answer as a lookup in `nextWorkingDays(day, fuzz)`, without building the window. */
export function isNextWorkingDay(
  day: CommitDate,
  candidate: CommitDate,
  fuzz: number,
  workWeek: WorkWeek = DEFAULT_WORK_WEEK,
): boolean {
  const gap = differenceInCalendarDays(candidate, day)
  return gap >= 1 && gap <= windowSpan(day, fuzz, workWeek)
}

export function formatDay(day: CommitDate): string {
  return format(day, 'yyyy-MM-dd')
}

/** Parses a `YYYY-MM-DD` prefix into a local-midnight date. */
export function parseDay(value: string): CommitDate | null {
  const match = /^\d{4}-\d{2}-\d{2}/.exec(value.trim())
  if (!match) {
    return null
  }
  const day = parseISO(match[0])
  return isValid(day) ? day : null
}
