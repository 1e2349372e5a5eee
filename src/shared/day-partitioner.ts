/**
 * Slices one continuous placement run into per-calendar-day views.
 *
 * Intervals are matched by the calendar dates of their boundaries, never
 * clipped: a segment running over midnight is listed in full on both days.
 * An interval ending exactly at midnight belongs only to the day it started.
 */

import { ConflictAttribution } from './enums'
import { CalendarDate, calendarDateOf } from './datetime-types'
import { DaySchedule, PlacementResult } from './types'

export interface PartitionOptions {
  timeZone?: string
  conflictAttribution?: ConflictAttribution
}

interface Interval {
  start: Date
  end: Date
}

function touchesDay(interval: Interval, date: CalendarDate, timeZone: string): boolean {
  const firstDay = calendarDateOf(interval.start, timeZone)
  const lastDay = calendarDateOf(new Date(interval.end.getTime() - 1), timeZone)
  return firstDay <= date && date <= lastDay
}

function assignConflicts(
  result: PlacementResult,
  dates: readonly CalendarDate[],
  timeZone: string,
  attribution: ConflictAttribution,
): Map<CalendarDate, string[]> {
  const byDay = new Map<CalendarDate, string[]>(dates.map(date => [date, []]))
  const firstDay = dates[0]
  const lastDay = dates[dates.length - 1]
  if (firstDay === undefined || lastDay === undefined) return byDay

  const attach = (date: CalendarDate, message: string): void => {
    byDay.get(date)?.push(message)
  }

  if (attribution === ConflictAttribution.FirstDay) {
    result.conflicts.forEach(message => attach(firstDay, message))
    return byDay
  }

  const violationDays = new Map<string, CalendarDate>()
  for (const violation of result.violations) {
    const completionDay = calendarDateOf(new Date(violation.completedAt.getTime() - 1), timeZone)
    let day = completionDay
    if (day < firstDay) day = firstDay
    if (day > lastDay) day = lastDay
    violationDays.set(violation.message, day)
  }

  // Run-level notices (exhaustion) have no completion date
  for (const message of result.conflicts) {
    attach(violationDays.get(message) ?? firstDay, message)
  }

  return byDay
}

export function partitionByDay(
  result: PlacementResult,
  dates: readonly CalendarDate[],
  options: PartitionOptions = {},
): DaySchedule[] {
  const timeZone = options.timeZone ?? 'UTC'
  const attribution = options.conflictAttribution ?? ConflictAttribution.FirstDay
  const conflictsByDay = assignConflicts(result, dates, timeZone, attribution)

  return dates.map(date => ({
    date,
    scheduledTasks: result.scheduledTasks.filter(segment => touchesDay(segment, date, timeZone)),
    blockedTime: result.blockedTime.filter(block => touchesDay(block, date, timeZone)),
    conflicts: conflictsByDay.get(date) ?? [],
  }))
}
