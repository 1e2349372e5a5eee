import { describe, it, expect } from 'vitest'
import {
  createScheduledTask,
  createTask,
  createTimeBlock,
  getEffectiveDeadline,
  getScheduledMinutes,
  getTaskDurationMs,
  sortTimeBlocks,
  withTaskFields,
} from '../types'
import { DeadlineKind, TimeBlockKind } from '../enums'
import { DomainValidationError } from '../errors'
import { createMockTask } from '@/test/factories'

describe('types', () => {
  describe('createTask', () => {
    it('should apply defaults', () => {
      const task = createTask({ title: 'Write tests', estimatedDuration: 45 })

      expect(task.id).toMatch(/^task_[a-z0-9]{8}$/)
      expect(task.completed).toBe(false)
      expect(task.source).toBe('local')
      expect(task.project).toBeUndefined()
    })

    it('should keep a given id and allow an empty title with it', () => {
      const task = createTask({ id: 'task_keep', estimatedDuration: 10 })

      expect(task.id).toBe('task_keep')
      expect(task.title).toBe('')
    })

    it('should require an id or a title', () => {
      expect(() => createTask({ estimatedDuration: 10 })).toThrow(DomainValidationError)
    })

    it.each([0, -5, Number.NaN, Number.POSITIVE_INFINITY])('should reject duration %s', duration => {
      expect(() => createTask({ title: 'Bad', estimatedDuration: duration })).toThrow(/estimatedDuration must be positive/)
    })

    it('should reject a deadline without an offset', () => {
      expect(() => createTask({ title: 'Naive', estimatedDuration: 10, deadlineUser: '2025-01-15T12:00:00' }))
        .toThrow('Invalid Task: deadlineUser must be timezone-aware (got "2025-01-15T12:00:00")')
    })

    it('should accept offsets other than Z', () => {
      const task = createTask({ title: 'Offset', estimatedDuration: 10, deadlineExternal: '2025-01-15T12:00:00+02:00' })

      expect(task.deadlineExternal?.toISOString()).toBe('2025-01-15T10:00:00.000Z')
    })

    it('should copy Date deadlines', () => {
      const deadline = new Date('2025-01-15T12:00:00Z')
      const task = createTask({ title: 'Copy', estimatedDuration: 10, deadlineUser: deadline })

      deadline.setUTCHours(0)

      expect(task.deadlineUser?.toISOString()).toBe('2025-01-15T12:00:00.000Z')
    })
  })

  describe('withTaskFields', () => {
    it('should return a new task and leave the original alone', () => {
      const task = createMockTask()
      const updated = withTaskFields(task, { project: 'Website' })

      expect(updated.project).toBe('Website')
      expect(task.project).toBeUndefined()
      expect(updated).not.toBe(task)
    })
  })

  describe('getEffectiveDeadline', () => {
    it('should prefer the external deadline when both are set', () => {
      const task = createMockTask({ deadlineUser: '2025-01-15T10:00:00Z', deadlineExternal: '2025-01-15T17:00:00Z' })

      expect(getEffectiveDeadline(task)).toEqual({ at: new Date('2025-01-15T17:00:00Z'), kind: DeadlineKind.External })
    })

    it('should fall back to the user deadline', () => {
      const task = createMockTask({ deadlineUser: '2025-01-15T10:00:00Z' })

      expect(getEffectiveDeadline(task)).toEqual({ at: new Date('2025-01-15T10:00:00Z'), kind: DeadlineKind.User })
    })

    it('should be undefined without deadlines', () => {
      expect(getEffectiveDeadline(createMockTask())).toBeUndefined()
    })
  })

  describe('getTaskDurationMs', () => {
    it('should round to whole milliseconds with a floor of one', () => {
      expect(getTaskDurationMs(createMockTask({ estimatedDuration: 90 }))).toBe(5_400_000)
      expect(getTaskDurationMs(createMockTask({ estimatedDuration: 0.5 + 1e-9 }))).toBe(30_000)
      expect(getTaskDurationMs(createMockTask({ estimatedDuration: 1e-9 }))).toBe(1)
    })
  })

  describe('createTimeBlock', () => {
    it('should build a block from ISO strings', () => {
      const block = createTimeBlock({ start: '2025-01-15T12:00:00Z', end: '2025-01-15T13:00:00Z', kind: 'break', label: 'Lunch' })

      expect(block).toEqual({
        start: new Date('2025-01-15T12:00:00Z'),
        end: new Date('2025-01-15T13:00:00Z'),
        kind: TimeBlockKind.Break,
        label: 'Lunch',
      })
    })

    it('should reject start at or after end', () => {
      expect(() => createTimeBlock({ start: '2025-01-15T13:00:00Z', end: '2025-01-15T13:00:00Z', kind: 'break' }))
        .toThrow('Invalid TimeBlock: start must be before end')
    })

    it('should reject unknown kinds', () => {
      expect(() => createTimeBlock({ start: '2025-01-15T12:00:00Z', end: '2025-01-15T13:00:00Z', kind: 'nap' }))
        .toThrow('Invalid TimeBlock: unknown kind "nap"')
    })

    it('should sort blocks by start without touching the input', () => {
      const late = createTimeBlock({ start: '2025-01-15T15:00:00Z', end: '2025-01-15T16:00:00Z', kind: 'meeting' })
      const early = createTimeBlock({ start: '2025-01-15T08:00:00Z', end: '2025-01-15T09:00:00Z', kind: 'meeting' })
      const input = [late, early]

      expect(sortTimeBlocks(input)).toEqual([early, late])
      expect(input).toEqual([late, early])
    })
  })

  describe('createScheduledTask', () => {
    const task = createMockTask({ estimatedDuration: 60 })

    it('should require the full duration for a non-segment', () => {
      expect(() => createScheduledTask({
        task,
        start: new Date('2025-01-15T09:00:00Z'),
        end: new Date('2025-01-15T09:30:00Z'),
      })).toThrow(/duration must equal/)
    })

    it('should accept a partial segment with valid indices', () => {
      const scheduled = createScheduledTask({
        task,
        start: new Date('2025-01-15T09:00:00Z'),
        end: new Date('2025-01-15T09:30:00Z'),
        segment: { index: 1, total: 2 },
      })

      expect(scheduled.isSegment).toBe(true)
      expect(scheduled.segmentIndex).toBe(1)
      expect(scheduled.totalSegments).toBe(2)
      expect(getScheduledMinutes(scheduled)).toBe(30)
    })

    it.each([
      [0, 2],
      [3, 2],
      [1.5, 2],
    ])('should reject segment %s of %s', (index, total) => {
      expect(() => createScheduledTask({
        task,
        start: new Date('2025-01-15T09:00:00Z'),
        end: new Date('2025-01-15T09:30:00Z'),
        segment: { index, total },
      })).toThrow(DomainValidationError)
    })

    it('should reject an empty interval', () => {
      expect(() => createScheduledTask({
        task,
        start: new Date('2025-01-15T09:00:00Z'),
        end: new Date('2025-01-15T09:00:00Z'),
        segment: { index: 1, total: 1 },
      })).toThrow('Invalid ScheduledTask: start must be before end')
    })
  })
})
