import { describe, it, expect } from 'vitest'
import {
  TASK_IDENTIFIER,
  discoverCheckboxListId,
  parseDeadline,
  parseDuration,
  parseTaskLine,
  parseTaskText,
} from '../task-parser'
import { ParagraphStyle } from '../document-types'
import { TaskParseError } from '../errors'

function captureParseError(run: () => unknown): TaskParseError {
  try {
    run()
  } catch (error) {
    if (error instanceof TaskParseError) return error
    throw error
  }
  throw new Error('expected a TaskParseError')
}

describe('task-parser', () => {
  describe('parseDuration', () => {
    it.each([
      ['2hours', 120],
      ['1hour', 60],
      ['45minutes', 45],
      ['1minute', 1],
      ['3HOURS', 180],
    ])('should parse %s as %i minutes', (input, minutes) => {
      expect(parseDuration(input)).toBe(minutes)
    })

    it('should reject a missing duration', () => {
      const error = captureParseError(() => parseDuration('-', 'Fix ::: - ; - ; -'))

      expect(error.message).toBe("Duration cannot be unspecified (use a value, not '-')")
      expect(error.field).toBe('duration')
      expect(error.value).toBe('-')
      expect(error.rawText).toBe('Fix ::: - ; - ; -')
    })

    it.each(['2 hours', '2h', 'hours', '1.5hours', '2days'])('should reject %j', input => {
      expect(() => parseDuration(input)).toThrow(`Invalid duration format: '${input}'`)
    })

    it('should reject zero', () => {
      expect(() => parseDuration('0minutes')).toThrow('Duration must be positive, got 0')
    })
  })

  describe('parseDeadline', () => {
    it('should treat "-" as no deadline', () => {
      expect(parseDeadline('-', 'user_deadline')).toBeUndefined()
    })

    it('should keep explicit offsets', () => {
      expect(parseDeadline('2026-01-09T12:00+02:00', 'user_deadline')?.toISOString()).toBe('2026-01-09T10:00:00.000Z')
    })

    it('should read naive values as UTC by default', () => {
      expect(parseDeadline('2026-01-09T12:00', 'user_deadline')?.toISOString()).toBe('2026-01-09T12:00:00.000Z')
      expect(parseDeadline('2026-01-09', 'user_deadline')?.toISOString()).toBe('2026-01-09T00:00:00.000Z')
    })

    it('should read naive values in the given zone', () => {
      const deadline = parseDeadline('2026-01-09T12:00', 'user_deadline', { timeZone: 'America/New_York' })
      expect(deadline?.toISOString()).toBe('2026-01-09T17:00:00.000Z')
    })

    it('should name the field on failure', () => {
      const error = captureParseError(() => parseDeadline('next friday', 'external_deadline'))

      expect(error.field).toBe('external_deadline')
      expect(error.message).toBe(
        "Invalid deadline format: 'next friday'. Expected ISO-8601 (e.g. 2026-01-09T12:00 or 2026-01-09T12:00+00:00)",
      )
    })

    it('should reject impossible dates', () => {
      expect(() => parseDeadline('2026-02-30T12:00', 'user_deadline')).toThrow(TaskParseError)
    })
  })

  describe('parseTaskText', () => {
    it('should parse a full task line', () => {
      const task = parseTaskText('Ship release notes ::: 90minutes ; 2026-01-09T17:00Z ; 2026-01-08T12:00Z', false, {
        id: 'task_fixed',
        source: 'docs',
      })

      expect(task).toEqual({
        id: 'task_fixed',
        title: 'Ship release notes',
        estimatedDuration: 90,
        deadlineExternal: new Date('2026-01-09T17:00:00Z'),
        deadlineUser: new Date('2026-01-08T12:00:00Z'),
        completed: false,
        source: 'docs',
      })
    })

    it('should tolerate spacing around separators', () => {
      const task = parseTaskText('Tidy desk:::30minutes;-;-', true)

      expect(task?.title).toBe('Tidy desk')
      expect(task?.estimatedDuration).toBe(30)
      expect(task?.deadlineExternal).toBeUndefined()
      expect(task?.deadlineUser).toBeUndefined()
      expect(task?.completed).toBe(true)
    })

    it('should ignore lines without metadata and the identifier line', () => {
      expect(parseTaskText('Just a note', false)).toBeUndefined()
      expect(parseTaskText(TASK_IDENTIFIER, false)).toBeUndefined()
      expect(parseTaskText('   ', false)).toBeUndefined()
    })

    it('should require exactly three fields', () => {
      const error = captureParseError(() => parseTaskText('Plan ::: 1hour ; -', false))

      expect(error.message).toBe(
        'Invalid metadata format: expected 3 fields, got 2. Format: duration ; external_deadline ; user_deadline',
      )
      expect(error.field).toBe('metadata')
      expect(error.value).toBe('1hour ; -')
    })

    it('should require a title', () => {
      expect(() => parseTaskText('::: 1hour ; - ; -', false)).toThrow('Task title cannot be empty')
    })
  })

  describe('parseTaskLine', () => {
    const bullet = { listId: 'list-tasks', nestingLevel: 0, hasStrikethrough: false }

    it('should only accept bullets of the checkbox list', () => {
      const line = { text: 'Call bank ::: 15minutes ; - ; -', style: ParagraphStyle.Normal, bullet }

      expect(parseTaskLine(line, 'list-tasks')?.title).toBe('Call bank')
      expect(parseTaskLine(line, 'list-other')).toBeUndefined()
      expect(parseTaskLine(line, undefined)).toBeUndefined()
      expect(parseTaskLine({ text: line.text, style: ParagraphStyle.Normal }, 'list-tasks')).toBeUndefined()
    })

    it('should mark strikethrough bullets completed', () => {
      const line = {
        text: 'Call bank ::: 15minutes ; - ; -',
        style: ParagraphStyle.Normal,
        bullet: { ...bullet, hasStrikethrough: true },
      }

      expect(parseTaskLine(line, 'list-tasks')?.completed).toBe(true)
    })
  })

  describe('discoverCheckboxListId', () => {
    it('should find the list holding the identifier line', () => {
      expect(discoverCheckboxListId([
        { text: 'Intro', style: ParagraphStyle.Normal },
        { text: TASK_IDENTIFIER, style: ParagraphStyle.Normal, bullet: { listId: 'list-7', nestingLevel: 0, hasStrikethrough: false } },
      ])).toBe('list-7')
    })

    it('should ignore an identifier that is not a bullet', () => {
      expect(discoverCheckboxListId([{ text: TASK_IDENTIFIER, style: ParagraphStyle.Normal }])).toBeUndefined()
    })
  })
})
