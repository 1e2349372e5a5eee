import { describe, it, expect } from 'vitest'
import {
  getPriorityTier,
  getQueuePosition,
  prioritizeProjects,
  prioritizeTasks,
} from '../task-prioritizer'
import { createProjectTodo } from '../task-aggregation'
import { PriorityTier } from '../enums'
import { createMockTask } from '@/test/factories'

describe('task-prioritizer', () => {
  describe('getPriorityTier', () => {
    it('should classify by deadline type and completion', () => {
      expect(getPriorityTier(createMockTask({ deadlineExternal: '2025-01-20T17:00:00Z' }))).toBe(PriorityTier.HardDeadline)
      expect(getPriorityTier(createMockTask({ deadlineUser: '2025-01-20T17:00:00Z' }))).toBe(PriorityTier.SoftDeadline)
      expect(getPriorityTier(createMockTask())).toBe(PriorityTier.NoDeadline)
      expect(getPriorityTier(createMockTask({ completed: true, deadlineExternal: '2025-01-20T17:00:00Z' }))).toBe(PriorityTier.Completed)
    })

    it('should put a task with both deadlines in the hard tier', () => {
      const task = createMockTask({ deadlineUser: '2025-01-18T17:00:00Z', deadlineExternal: '2025-01-20T17:00:00Z' })
      expect(getPriorityTier(task)).toBe(PriorityTier.HardDeadline)
    })
  })

  describe('prioritizeTasks', () => {
    it('should order tiers hard, soft, none, then completed', () => {
      const tasks = [
        createMockTask({ title: 'Done', completed: true }),
        createMockTask({ title: 'Loose' }),
        createMockTask({ title: 'Personal', deadlineUser: '2025-01-16T12:00:00Z' }),
        createMockTask({ title: 'Client', deadlineExternal: '2025-01-30T12:00:00Z' }),
      ]

      expect(prioritizeTasks(tasks).map(task => task.title)).toEqual(['Client', 'Personal', 'Loose', 'Done'])
    })

    it('should sort within a deadline tier by deadline, then duration, then title', () => {
      const tasks = [
        createMockTask({ title: 'Zeta', estimatedDuration: 30, deadlineExternal: '2025-01-20T12:00:00Z' }),
        createMockTask({ title: 'Alpha', estimatedDuration: 30, deadlineExternal: '2025-01-20T12:00:00Z' }),
        createMockTask({ title: 'Long', estimatedDuration: 90, deadlineExternal: '2025-01-20T12:00:00Z' }),
        createMockTask({ title: 'Early', estimatedDuration: 240, deadlineExternal: '2025-01-19T12:00:00Z' }),
      ]

      expect(prioritizeTasks(tasks).map(task => task.title)).toEqual(['Early', 'Alpha', 'Zeta', 'Long'])
    })

    it('should sort the soft tier by user deadline', () => {
      const tasks = [
        createMockTask({ title: 'Later', deadlineUser: '2025-01-21T12:00:00Z' }),
        createMockTask({ title: 'Sooner', deadlineUser: '2025-01-17T12:00:00Z' }),
      ]

      expect(prioritizeTasks(tasks).map(task => task.title)).toEqual(['Sooner', 'Later'])
    })

    it('should sort undeadlined tasks by duration, then title', () => {
      const tasks = [
        createMockTask({ title: 'b', estimatedDuration: 60 }),
        createMockTask({ title: 'a', estimatedDuration: 60 }),
        createMockTask({ title: 'quick', estimatedDuration: 15 }),
      ]

      expect(prioritizeTasks(tasks).map(task => task.title)).toEqual(['quick', 'a', 'b'])
    })

    it('should sort completed tasks by duration, deadline, then title', () => {
      const tasks = [
        createMockTask({ title: 'No deadline', estimatedDuration: 30, completed: true }),
        createMockTask({ title: 'With deadline', estimatedDuration: 30, completed: true, deadlineUser: '2025-01-20T12:00:00Z' }),
        createMockTask({ title: 'Short', estimatedDuration: 10, completed: true }),
      ]

      expect(prioritizeTasks(tasks).map(task => task.title)).toEqual(['Short', 'With deadline', 'No deadline'])
    })

    it('should keep input order for fully tied tasks', () => {
      const first = createMockTask({ id: 'task_first', title: 'Same', estimatedDuration: 45 })
      const second = createMockTask({ id: 'task_second', title: 'Same', estimatedDuration: 45 })

      expect(prioritizeTasks([first, second]).map(task => task.id)).toEqual(['task_first', 'task_second'])
      expect(prioritizeTasks([second, first]).map(task => task.id)).toEqual(['task_second', 'task_first'])
    })

    it('should not modify its input', () => {
      const tasks = [createMockTask({ title: 'b' }), createMockTask({ title: 'a' })]
      const snapshot = [...tasks]

      prioritizeTasks(tasks)

      expect(tasks).toEqual(snapshot)
    })
  })

  describe('prioritizeProjects', () => {
    it('should merge projects into one ordering and backfill project labels', () => {
      const website = createProjectTodo('Website', [
        createMockTask({ title: 'Fix footer', estimatedDuration: 30 }),
      ])
      const billing = createProjectTodo('Billing', [
        createMockTask({ title: 'Invoice run', estimatedDuration: 60, deadlineExternal: '2025-01-31T17:00:00Z' }),
        createMockTask({ title: 'Tagged', estimatedDuration: 20, project: 'Finance' }),
      ])

      const ordered = prioritizeProjects([website, billing])

      expect(ordered.map(task => [task.title, task.project])).toEqual([
        ['Invoice run', 'Billing'],
        ['Tagged', 'Finance'],
        ['Fix footer', 'Website'],
      ])
    })

    it('should leave the source lists untouched and give equal results on repeat', () => {
      const list = createProjectTodo('Website', [createMockTask({ title: 'Fix footer' })])

      const first = prioritizeProjects([list])
      const second = prioritizeProjects([list])

      expect(list.tasks[0]?.project).toBeUndefined()
      expect(second).toEqual(first)
    })
  })

  describe('getQueuePosition', () => {
    it('should count only incomplete tasks', () => {
      const ordered = prioritizeTasks([
        createMockTask({ id: 'task_a', title: 'a', estimatedDuration: 10 }),
        createMockTask({ id: 'task_done', title: 'done', completed: true }),
        createMockTask({ id: 'task_b', title: 'b', estimatedDuration: 20 }),
      ])

      expect(getQueuePosition(ordered, 'task_b')).toBe(2)
      expect(getQueuePosition(ordered, 'task_done')).toBeUndefined()
      expect(getQueuePosition(ordered, 'task_missing')).toBeUndefined()
    })
  })
})
