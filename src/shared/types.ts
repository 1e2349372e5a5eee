/**
 * Domain model
 *
 * Values are readonly and only ever built through the create* factories,
 * which enforce construction invariants. Nothing downstream re-validates.
 */

import { DeadlineKind, TimeBlockKind, isTimeBlockKind } from './enums'
import { TaskId, generateTaskId, isTaskId } from './id-types'
import { CalendarDate, InstantInput, parseInstant } from './datetime-types'
import { DomainValidationError } from './errors'

export const MS_PER_MINUTE = 60_000

// ============================================================================
// Task
// ============================================================================

export interface Task {
  readonly id: TaskId
  readonly title: string
  readonly project?: string
  readonly section?: string
  /** Estimated work in minutes, always > 0 */
  readonly estimatedDuration: number
  readonly deadlineUser?: Date
  readonly deadlineExternal?: Date
  readonly completed: boolean
  readonly source: string
}

export interface TaskInput {
  id?: string
  title?: string
  project?: string
  section?: string
  estimatedDuration: number
  deadlineUser?: InstantInput
  deadlineExternal?: InstantInput
  completed?: boolean
  source?: string
}

function toDeadline(value: InstantInput | undefined, field: string): Date | undefined {
  if (value === undefined) return undefined
  const result = parseInstant(value)
  if (!result.ok) {
    throw new DomainValidationError('Task', `${field} ${result.reason}`)
  }
  return result.instant
}

export function createTask(input: TaskInput): Task {
  const id = input.id && isTaskId(input.id) ? TaskId(input.id) : generateTaskId()
  const title = input.title ?? ''

  if (!input.id && !title) {
    throw new DomainValidationError('Task', 'at least one of id or title must be non-empty')
  }

  if (!Number.isFinite(input.estimatedDuration) || input.estimatedDuration <= 0) {
    throw new DomainValidationError('Task', `estimatedDuration must be positive (got ${input.estimatedDuration})`)
  }

  const deadlineUser = toDeadline(input.deadlineUser, 'deadlineUser')
  const deadlineExternal = toDeadline(input.deadlineExternal, 'deadlineExternal')

  return {
    id,
    title,
    ...(input.project ? { project: input.project } : {}),
    ...(input.section ? { section: input.section } : {}),
    estimatedDuration: input.estimatedDuration,
    ...(deadlineUser ? { deadlineUser } : {}),
    ...(deadlineExternal ? { deadlineExternal } : {}),
    completed: input.completed ?? false,
    source: input.source ?? 'local',
  }
}

/**
 * Copy of a task with some fields replaced. Tasks are never mutated.
 */
export function withTaskFields(task: Task, fields: Partial<Pick<Task, 'project' | 'section' | 'completed'>>): Task {
  return { ...task, ...fields }
}

export interface EffectiveDeadline {
  at: Date
  kind: DeadlineKind
}

/**
 * The single deadline used for urgency and tiering.
 * External commitments win over personal targets when both are set.
 */
export function getEffectiveDeadline(task: Task): EffectiveDeadline | undefined {
  if (task.deadlineExternal) {
    return { at: task.deadlineExternal, kind: DeadlineKind.External }
  }
  if (task.deadlineUser) {
    return { at: task.deadlineUser, kind: DeadlineKind.User }
  }
  return undefined
}

/**
 * Work the engine places for a task, in whole milliseconds (at least one)
 * so segment boundaries stay representable as Dates.
 */
export function getTaskDurationMs(task: Task): number {
  return Math.max(1, Math.round(task.estimatedDuration * MS_PER_MINUTE))
}

// ============================================================================
// TimeBlock
// ============================================================================

export interface TimeBlock {
  readonly start: Date
  readonly end: Date
  readonly kind: TimeBlockKind
  readonly label?: string
}

export interface TimeBlockInput {
  start: InstantInput
  end: InstantInput
  kind: TimeBlockKind | string
  label?: string
}

export function createTimeBlock(input: TimeBlockInput): TimeBlock {
  const start = parseInstant(input.start)
  if (!start.ok) throw new DomainValidationError('TimeBlock', `start ${start.reason}`)

  const end = parseInstant(input.end)
  if (!end.ok) throw new DomainValidationError('TimeBlock', `end ${end.reason}`)

  if (start.instant.getTime() >= end.instant.getTime()) {
    throw new DomainValidationError('TimeBlock', 'start must be before end')
  }

  const kind = input.kind
  if (!isTimeBlockKind(kind)) {
    throw new DomainValidationError('TimeBlock', `unknown kind "${kind}"`)
  }

  return {
    start: start.instant,
    end: end.instant,
    kind,
    ...(input.label ? { label: input.label } : {}),
  }
}

export function sortTimeBlocks(blocks: readonly TimeBlock[]): TimeBlock[] {
  return [...blocks].sort((a, b) => a.start.getTime() - b.start.getTime())
}

// ============================================================================
// ScheduledTask
// ============================================================================

export interface ScheduledTask {
  readonly task: Task
  readonly start: Date
  readonly end: Date
  readonly violatesDeadlineUser: boolean
  readonly violatesDeadlineExternal: boolean
  readonly isSegment: boolean
  /** 1-based; present only when isSegment is true */
  readonly segmentIndex?: number
  readonly totalSegments?: number
}

export interface ScheduledTaskInput {
  task: Task
  start: Date
  end: Date
  violatesDeadlineUser?: boolean
  violatesDeadlineExternal?: boolean
  segment?: { index: number; total: number }
}

export function createScheduledTask(input: ScheduledTaskInput): ScheduledTask {
  const startMs = input.start.getTime()
  const endMs = input.end.getTime()

  if (Number.isNaN(startMs) || Number.isNaN(endMs)) {
    throw new DomainValidationError('ScheduledTask', 'start and end must be valid instants')
  }

  if (startMs >= endMs) {
    throw new DomainValidationError('ScheduledTask', 'start must be before end')
  }

  const base = {
    task: input.task,
    start: new Date(startMs),
    end: new Date(endMs),
    violatesDeadlineUser: input.violatesDeadlineUser ?? false,
    violatesDeadlineExternal: input.violatesDeadlineExternal ?? false,
  }

  if (!input.segment) {
    if (endMs - startMs !== getTaskDurationMs(input.task)) {
      throw new DomainValidationError('ScheduledTask', 'duration must equal the task\'s estimatedDuration')
    }
    return { ...base, isSegment: false }
  }

  const { index, total } = input.segment
  if (!Number.isInteger(index) || !Number.isInteger(total) || index < 1 || index > total) {
    throw new DomainValidationError('ScheduledTask', `segmentIndex must be between 1 and totalSegments (got ${index}/${total})`)
  }

  return { ...base, isSegment: true, segmentIndex: index, totalSegments: total }
}

export function getScheduledMinutes(scheduled: ScheduledTask): number {
  return (scheduled.end.getTime() - scheduled.start.getTime()) / MS_PER_MINUTE
}

// ============================================================================
// Placement output
// ============================================================================

export interface DeadlineViolation {
  readonly task: Task
  readonly kind: DeadlineKind
  readonly completedAt: Date
  readonly deadline: Date
  readonly message: string
}

export interface UnscheduledWork {
  readonly task: Task
  /** Minutes of work never placed */
  readonly remainingMinutes: number
}

export interface PlacementResult {
  /** Chronological */
  readonly scheduledTasks: readonly ScheduledTask[]
  readonly blockedTime: readonly TimeBlock[]
  readonly conflicts: readonly string[]
  readonly violations: readonly DeadlineViolation[]
  readonly unscheduled: readonly UnscheduledWork[]
  readonly exhausted: boolean
}

// ============================================================================
// DaySchedule
// ============================================================================

export interface DaySchedule {
  readonly date: CalendarDate
  readonly scheduledTasks: readonly ScheduledTask[]
  readonly blockedTime: readonly TimeBlock[]
  readonly conflicts: readonly string[]
}
