/**
 * Branded (Nominal) DateTime Types
 *
 * Instants are absolute points in time. Anything that arrives as a string
 * must carry its offset ("Z" or "±HH:MM"); wall-clock strings without one
 * are ambiguous and rejected. Calendar dates and local times are only ever
 * interpreted together with an IANA time zone.
 */

import { isValid, parseISO } from 'date-fns'
import { formatInTimeZone, fromZonedTime } from 'date-fns-tz'
import type { Brand } from './id-types'
import { InvalidInputError } from './errors'

// =============================================================================
// Instants
// =============================================================================

/** Anything the engine accepts as an instant */
export type InstantInput = Date | string

/** ISO-8601 date-time with a mandatory offset */
const ZONED_ISO_PATTERN = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2}(\.\d{1,9})?)?(Z|[+-]\d{2}:?\d{2})$/

export type InstantParseResult =
  | { ok: true; instant: Date }
  | { ok: false; reason: string }

/**
 * Parse an instant without throwing.
 */
export function parseInstant(value: InstantInput): InstantParseResult {
  if (value instanceof Date) {
    if (!isValid(value)) {
      return { ok: false, reason: 'is an invalid Date' }
    }
    return { ok: true, instant: new Date(value.getTime()) }
  }

  if (typeof value !== 'string' || !value.trim()) {
    return { ok: false, reason: 'must be a Date or an ISO-8601 string' }
  }

  const trimmed = value.trim()
  if (!ZONED_ISO_PATTERN.test(trimmed)) {
    return { ok: false, reason: `must be timezone-aware (got "${trimmed}")` }
  }

  const parsed = parseISO(trimmed)
  if (!isValid(parsed)) {
    return { ok: false, reason: `is not a valid date-time (got "${trimmed}")` }
  }

  return { ok: true, instant: parsed }
}

/**
 * Parse an instant or fail with an InvalidInputError naming the field.
 */
export function toInstant(value: InstantInput, field: string): Date {
  const result = parseInstant(value)
  if (!result.ok) {
    throw new InvalidInputError(`${field} ${result.reason}`, field)
  }
  return result.instant
}

export function hasExplicitOffset(value: string): boolean {
  return ZONED_ISO_PATTERN.test(value.trim())
}

// =============================================================================
// Time zones
// =============================================================================

export function isValidTimeZone(timeZone: string): boolean {
  if (!timeZone) return false
  try {
    new Intl.DateTimeFormat('en-US', { timeZone })
    return true
  } catch (error) {
    if (error instanceof RangeError) return false
    throw error
  }
}

// =============================================================================
// CalendarDate Type
// =============================================================================

/**
 * A calendar day, "YYYY-MM-DD". Has no meaning without a time zone.
 */
export type CalendarDate = Brand<string, 'CalendarDate'>

const CALENDAR_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/

/**
 * @throws Error if the string is not a real calendar date
 */
export function toCalendarDate(input: string): CalendarDate {
  const match = input.match(CALENDAR_DATE_PATTERN)
  if (!match) {
    throw new Error(`Invalid CalendarDate format: "${input}". Expected "YYYY-MM-DD"`)
  }
  const [year, month, day] = [Number(match[1]), Number(match[2]), Number(match[3])]
  const probe = new Date(Date.UTC(year, month - 1, day))
  if (probe.getUTCFullYear() !== year || probe.getUTCMonth() !== month - 1 || probe.getUTCDate() !== day) {
    throw new Error(`Invalid CalendarDate: "${input}" does not exist`)
  }
  return input as CalendarDate
}

export function isCalendarDate(value: unknown): value is CalendarDate {
  if (typeof value !== 'string' || !CALENDAR_DATE_PATTERN.test(value)) return false
  try {
    toCalendarDate(value)
    return true
  } catch {
    return false
  }
}

/**
 * The calendar date an instant falls on in the given zone.
 */
export function calendarDateOf(instant: Date, timeZone: string): CalendarDate {
  return formatInTimeZone(instant, timeZone, 'yyyy-MM-dd') as CalendarDate
}

/**
 * Pure calendar arithmetic; no time zone or DST involved.
 */
export function addCalendarDays(date: CalendarDate, days: number): CalendarDate {
  const [year, month, day] = date.split('-').map(Number)
  const shifted = new Date(Date.UTC(year ?? 1970, (month ?? 1) - 1, (day ?? 1) + days))
  return shifted.toISOString().slice(0, 10) as CalendarDate
}

export function calendarDateRange(first: CalendarDate, count: number): CalendarDate[] {
  return Array.from({ length: count }, (_, offset) => addCalendarDays(first, offset))
}

export type WeekdayName =
  | 'sunday' | 'monday' | 'tuesday' | 'wednesday' | 'thursday' | 'friday' | 'saturday'

export const WEEKDAY_NAMES: readonly WeekdayName[] = [
  'sunday', 'monday', 'tuesday', 'wednesday', 'thursday', 'friday', 'saturday',
]

export function weekdayOf(date: CalendarDate): WeekdayName {
  const [year, month, day] = date.split('-').map(Number)
  const index = new Date(Date.UTC(year ?? 1970, (month ?? 1) - 1, day ?? 1)).getUTCDay()
  return WEEKDAY_NAMES[index] ?? 'sunday'
}

// =============================================================================
// LocalTime Type
// =============================================================================

/**
 * Wall-clock time, "HH:MM" (24-hour).
 */
export type LocalTime = Brand<string, 'LocalTime'>

const LOCAL_TIME_PATTERN = /^([01]\d|2[0-3]):([0-5]\d)$/

/**
 * Accepts "HH:MM" and "H:MM".
 *
 * @throws Error if input cannot be parsed to valid time
 */
export function toLocalTime(input: string): LocalTime {
  if (LOCAL_TIME_PATTERN.test(input)) {
    return input as LocalTime
  }

  const shortMatch = input.match(/^(\d):([0-5]\d)$/)
  if (shortMatch) {
    return `0${shortMatch[1]}:${shortMatch[2]}` as LocalTime
  }

  throw new Error(`Invalid LocalTime format: "${input}". Expected "HH:MM" (24-hour format)`)
}

export function isLocalTime(value: unknown): value is LocalTime {
  return typeof value === 'string' && LOCAL_TIME_PATTERN.test(value)
}

export function localTimeToMinutes(time: LocalTime): number {
  const [hours, minutes] = time.split(':').map(Number)
  return (hours ?? 0) * 60 + (minutes ?? 0)
}

/**
 * The instant at which the wall clock in `timeZone` reads `time` on `date`.
 */
export function zonedInstant(date: CalendarDate, time: LocalTime, timeZone: string): Date {
  return fromZonedTime(`${date}T${time}:00`, timeZone)
}

/**
 * Format an instant as "YYYY-MM-DD HH:mm" in the given zone.
 */
export function formatDateTime(instant: Date, timeZone: string): string {
  return formatInTimeZone(instant, timeZone, 'yyyy-MM-dd HH:mm')
}

export function formatClockTime(instant: Date, timeZone: string): string {
  return formatInTimeZone(instant, timeZone, 'HH:mm')
}
