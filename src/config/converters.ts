/**
 * Configuration -> domain values for a given calendar day
 */

import {
  CalendarDate,
  LocalTime,
  addCalendarDays,
  weekdayOf,
  zonedInstant,
} from '@shared/datetime-types'
import { TimeBlock, createTimeBlock } from '@shared/types'
import { SlacklineConfig, TimeBlockConfig } from './settings'

export interface WorkWindow {
  start: Date
  end: Date
}

function allWindows(config: SlacklineConfig): TimeBlockConfig[] {
  const { sleepWindows, breaks, meetings } = config.scheduling
  return [...sleepWindows, ...breaks, ...meetings]
}

function endDateFor(date: CalendarDate, startTime: LocalTime, endTime: LocalTime): CalendarDate {
  // Overnight windows end on the following day
  return endTime <= startTime ? addCalendarDays(date, 1) : date
}

/**
 * Blocked intervals for one calendar date, from every configured window
 * whose days include that date's weekday. Times are read in `timeZone`
 * (the configured zone by default).
 */
export function configToTimeBlocks(
  config: SlacklineConfig,
  date: CalendarDate,
  timeZone: string = config.scheduling.timezone,
): TimeBlock[] {
  const weekday = weekdayOf(date)

  return allWindows(config)
    .filter(window => window.days.includes(weekday))
    .map(window => createTimeBlock({
      start: zonedInstant(date, window.startTime, timeZone),
      end: zonedInstant(endDateFor(date, window.startTime, window.endTime), window.endTime, timeZone),
      kind: window.kind,
      ...(window.label ? { label: window.label } : {}),
    }))
}

export function getWorkWindow(
  config: SlacklineConfig,
  date: CalendarDate,
  timeZone: string = config.scheduling.timezone,
): WorkWindow {
  return {
    start: zonedInstant(date, config.scheduling.workStartTime, timeZone),
    end: zonedInstant(date, config.scheduling.workEndTime, timeZone),
  }
}
