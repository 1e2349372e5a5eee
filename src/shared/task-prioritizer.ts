/**
 * Global task ordering across projects
 *
 * Produces the baseline priority sequence the placement engine consumes:
 * hard-deadline tier, soft-deadline tier, no-deadline tier, then completed
 * work. Within a tier: deadline, then duration, then title. Array.sort is
 * stable, so fully tied tasks keep their input order.
 */

import { PriorityTier } from './enums'
import { TaskId } from './id-types'
import { Task, getEffectiveDeadline } from './types'
import { ProjectTodoList, aggregateProjectTodos, getTaskPool } from './task-aggregation'

type TaskComparator = (a: Task, b: Task) => number

function compareTitles(a: Task, b: Task): number {
  if (a.title < b.title) return -1
  if (a.title > b.title) return 1
  return 0
}

function compareDurations(a: Task, b: Task): number {
  return a.estimatedDuration - b.estimatedDuration
}

// Absent deadlines sort as infinitely far away
function deadlineMs(deadline: Date | undefined): number {
  return deadline ? deadline.getTime() : Number.POSITIVE_INFINITY
}

function compareInstants(a: Date | undefined, b: Date | undefined): number {
  const left = deadlineMs(a)
  const right = deadlineMs(b)
  if (left === right) return 0
  return left < right ? -1 : 1
}

function chain(...comparators: TaskComparator[]): TaskComparator {
  return (a, b) => {
    for (const compare of comparators) {
      const result = compare(a, b)
      if (result !== 0) return result
    }
    return 0
  }
}

const byExternalDeadline = chain(
  (a, b) => compareInstants(a.deadlineExternal, b.deadlineExternal),
  compareDurations,
  compareTitles,
)

const byUserDeadline = chain(
  (a, b) => compareInstants(a.deadlineUser, b.deadlineUser),
  compareDurations,
  compareTitles,
)

const byDuration = chain(compareDurations, compareTitles)

const byCompletedMetadata = chain(
  compareDurations,
  (a, b) => compareInstants(getEffectiveDeadline(a)?.at, getEffectiveDeadline(b)?.at),
  compareTitles,
)

export function getPriorityTier(task: Task): PriorityTier {
  if (task.completed) return PriorityTier.Completed
  if (task.deadlineExternal) return PriorityTier.HardDeadline
  if (task.deadlineUser) return PriorityTier.SoftDeadline
  return PriorityTier.NoDeadline
}

function hasValidMetadata(task: Task): boolean {
  return Number.isFinite(task.estimatedDuration) && task.estimatedDuration > 0
}

/**
 * Order a flat task pool. The input array is not modified.
 */
export function prioritizeTasks(tasks: readonly Task[]): Task[] {
  const hard: Task[] = []
  const soft: Task[] = []
  const open: Task[] = []
  const done: Task[] = []

  for (const task of tasks) {
    switch (getPriorityTier(task)) {
      case PriorityTier.HardDeadline:
        hard.push(task)
        break
      case PriorityTier.SoftDeadline:
        soft.push(task)
        break
      case PriorityTier.NoDeadline:
        open.push(task)
        break
      case PriorityTier.Completed:
        done.push(task)
        break
    }
  }

  const doneWithMetadata = done.filter(hasValidMetadata).sort(byCompletedMetadata)
  const doneWithoutMetadata = done.filter(task => !hasValidMetadata(task)).sort(compareTitles)

  return [
    ...hard.sort(byExternalDeadline),
    ...soft.sort(byUserDeadline),
    ...open.sort(byDuration),
    ...doneWithMetadata,
    ...doneWithoutMetadata,
  ]
}

/**
 * Aggregate per-project lists (backfilling project labels) and order the pool.
 */
export function prioritizeProjects(lists: readonly ProjectTodoList[]): Task[] {
  return prioritizeTasks(getTaskPool(aggregateProjectTodos(lists)))
}

/**
 * 1-based position of a task among the incomplete tasks of an ordered
 * sequence, or undefined when it is absent or completed.
 */
export function getQueuePosition(ordered: readonly Task[], taskId: TaskId | string): number | undefined {
  const index = ordered
    .filter(task => !task.completed)
    .findIndex(task => task.id === taskId)

  return index === -1 ? undefined : index + 1
}
