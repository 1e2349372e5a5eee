/**
 * Task line parsing
 *
 * A task line reads
 *
 *   <title> ::: <duration> ; <external_deadline> ; <user_deadline>
 *
 * Duration is "<n>hour(s)" or "<n>minute(s)". Deadlines are ISO-8601 or "-"
 * for none; deadlines without an offset are read in the default zone.
 */

import { fromZonedTime } from 'date-fns-tz'
import { isValid } from 'date-fns'
import { DocumentParagraph } from './document-types'
import { hasExplicitOffset, isCalendarDate, parseInstant } from './datetime-types'
import { TaskParseError } from './errors'
import { Task, createTask } from './types'

export const TASK_IDENTIFIER = 'TASKS ::: duration; external_deadline; user_deadline'

const METADATA_PATTERN = /^(.*?)\s*:::\s*(.+)$/
const DURATION_PATTERN = /^(\d+)(hours?|minutes?)$/i
const NAIVE_ISO_PATTERN = /^\d{4}-\d{2}-\d{2}(T\d{2}:\d{2}(:\d{2}(\.\d{1,9})?)?)?$/
const ABSENT = '-'

export interface TaskParseOptions {
  source?: string
  /** Zone for deadlines written without an offset (default UTC) */
  timeZone?: string
  /** Fixed id for the parsed task; generated when absent */
  id?: string
}

/**
 * @returns minutes
 * @throws TaskParseError
 */
export function parseDuration(value: string, rawText?: string): number {
  const details = { rawText, field: 'duration', value }

  if (value === ABSENT) {
    throw new TaskParseError("Duration cannot be unspecified (use a value, not '-')", details)
  }

  const match = value.match(DURATION_PATTERN)
  if (!match) {
    throw new TaskParseError(
      `Invalid duration format: '${value}'. Expected format: <number>hours or <number>minutes`,
      details,
    )
  }

  const amount = Number(match[1])
  const unit = (match[2] ?? '').toLowerCase()

  if (amount <= 0) {
    throw new TaskParseError(`Duration must be positive, got ${amount}`, details)
  }

  return unit.startsWith('hour') ? amount * 60 : amount
}

/**
 * @returns undefined for "-"
 * @throws TaskParseError
 */
export function parseDeadline(
  value: string,
  field: string,
  options: { timeZone?: string; rawText?: string } = {},
): Date | undefined {
  if (value === ABSENT) return undefined

  const invalid = (): TaskParseError => new TaskParseError(
    `Invalid deadline format: '${value}'. Expected ISO-8601 (e.g. 2026-01-09T12:00 or 2026-01-09T12:00+00:00)`,
    { rawText: options.rawText, field, value },
  )

  if (hasExplicitOffset(value)) {
    const result = parseInstant(value)
    if (!result.ok) throw invalid()
    return result.instant
  }

  if (!NAIVE_ISO_PATTERN.test(value) || !isCalendarDate(value.slice(0, 10))) throw invalid()

  const instant = fromZonedTime(value, options.timeZone ?? 'UTC')
  if (!isValid(instant)) throw invalid()
  return instant
}

/**
 * Parse the text of one line. Lines without ":::" are not tasks.
 *
 * @throws TaskParseError when the metadata is malformed
 */
export function parseTaskText(
  text: string,
  completed: boolean,
  options: TaskParseOptions = {},
): Task | undefined {
  const trimmed = text.trim()
  if (!trimmed || trimmed === TASK_IDENTIFIER) return undefined

  const match = trimmed.match(METADATA_PATTERN)
  if (!match) return undefined

  const title = (match[1] ?? '').trim()
  const metadata = (match[2] ?? '').trim()

  const parts = metadata.split(';').map(part => part.trim())
  const [durationText, externalText, userText] = parts
  if (parts.length !== 3 || durationText === undefined || externalText === undefined || userText === undefined) {
    throw new TaskParseError(
      `Invalid metadata format: expected 3 fields, got ${parts.length}. Format: duration ; external_deadline ; user_deadline`,
      { rawText: trimmed, field: 'metadata', value: metadata },
    )
  }

  if (!title) {
    throw new TaskParseError('Task title cannot be empty', { rawText: trimmed, field: 'title', value: title })
  }

  const deadlineOptions = { timeZone: options.timeZone, rawText: trimmed }
  const estimatedDuration = parseDuration(durationText, trimmed)
  const deadlineExternal = parseDeadline(externalText, 'external_deadline', deadlineOptions)
  const deadlineUser = parseDeadline(userText, 'user_deadline', deadlineOptions)

  return createTask({
    ...(options.id ? { id: options.id } : {}),
    title,
    estimatedDuration,
    ...(deadlineExternal ? { deadlineExternal } : {}),
    ...(deadlineUser ? { deadlineUser } : {}),
    completed,
    source: options.source ?? 'local',
  })
}

/**
 * Parse a document paragraph. Only bullets of the tab's checkbox list are
 * task lines; a strikethrough bullet is a completed task.
 *
 * @throws TaskParseError when a task line's metadata is malformed
 */
export function parseTaskLine(
  paragraph: DocumentParagraph,
  checkboxListId: string | undefined,
  options: TaskParseOptions = {},
): Task | undefined {
  const { bullet } = paragraph
  if (!bullet || checkboxListId === undefined) return undefined
  if (bullet.listId !== checkboxListId) return undefined

  return parseTaskText(paragraph.text, bullet.hasStrikethrough, options)
}

/**
 * The list id of the bullet holding the identifier line, if any.
 */
export function discoverCheckboxListId(paragraphs: readonly DocumentParagraph[]): string | undefined {
  const marker = paragraphs.find(paragraph => paragraph.bullet && paragraph.text.trim() === TASK_IDENTIFIER)
  return marker?.bullet?.listId
}
