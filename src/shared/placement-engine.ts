/**
 * PLACEMENT ENGINE - deadline-aware opportunistic placement
 *
 * Consumes the prioritized task sequence, a start instant and blocked
 * intervals; produces concrete segments plus conflict messages.
 *
 * Features:
 * - Segmentation of tasks around blocked time (sleep, breaks, meetings)
 * - Urgency re-scored on every step from remaining work and slack
 * - Safety check that refuses to knowingly sink another critical deadline
 * - Violation flags derived from each task's overall completion
 * - Single-day and continuous multi-day runs
 *
 * Runs are pure: identical inputs produce identical output.
 */

import { logger } from '@/logger'
import { ConflictAttribution, DeadlineKind } from './enums'
import {
  CalendarDate,
  InstantInput,
  calendarDateOf,
  calendarDateRange,
  formatDateTime,
  isValidTimeZone,
  toInstant,
} from './datetime-types'
import { InvalidInputError } from './errors'
import {
  DaySchedule,
  DeadlineViolation,
  EffectiveDeadline,
  PlacementResult,
  ScheduledTask,
  Task,
  TimeBlock,
  TimeBlockInput,
  UnscheduledWork,
  MS_PER_MINUTE,
  createScheduledTask,
  createTimeBlock,
  getEffectiveDeadline,
  getTaskDurationMs,
  sortTimeBlocks,
} from './types'
import {
  advancePastBlocked,
  UrgencyScore,
  calculateUrgencyScore,
  compareUrgency,
  estimateCompletionTime,
  findNextBlock,
  isCriticalDeadline,
  isDeadlineFeasible,
} from './scheduler-priority'
import { partitionByDay } from './day-partitioner'

// ============================================================================
// TYPES
// ============================================================================

export type BlockedIntervalInput = TimeBlock | TimeBlockInput

export type BlockedTimeLookup = (date: CalendarDate) => readonly BlockedIntervalInput[]

export interface PlacementOptions {
  /** Zone for conflict timestamps and calendar days (default UTC) */
  timeZone?: string
  /**
   * Upper bound on placement steps per run. Without it every run is bounded
   * by its own task and block counts and always completes.
   */
  maxSegments?: number
  /** Multi-day views only */
  conflictAttribution?: ConflictAttribution
}

interface WorkItem {
  readonly task: Task
  readonly deadline?: EffectiveDeadline
  /** Position in the input; breaks urgency ties */
  readonly order: number
  remainingMs: number
}

interface RankedItem {
  readonly item: WorkItem
  readonly score: UrgencyScore
}

interface RawSegment {
  readonly item: WorkItem
  readonly start: number
  readonly end: number
}

/**
 * Every step either finishes a task or stops at the start of a block that
 * the cursor then leaves behind, so no run needs more steps than this.
 */
export function placementStepLimit(taskCount: number, blockCount: number): number {
  return taskCount + blockCount
}

// ============================================================================
// ENGINE
// ============================================================================

export class PlacementEngine {
  private readonly timeZone: string
  private readonly maxSegments?: number
  private readonly conflictAttribution: ConflictAttribution

  constructor(options: PlacementOptions = {}) {
    const timeZone = options.timeZone ?? 'UTC'
    if (!isValidTimeZone(timeZone)) {
      throw new InvalidInputError(`Unknown time zone "${timeZone}"`, 'timeZone')
    }

    const { maxSegments } = options
    if (maxSegments !== undefined && (!Number.isInteger(maxSegments) || maxSegments < 1)) {
      throw new InvalidInputError(`maxSegments must be a positive integer (got ${maxSegments})`, 'maxSegments')
    }

    this.timeZone = timeZone
    if (maxSegments !== undefined) this.maxSegments = maxSegments
    this.conflictAttribution = options.conflictAttribution ?? ConflictAttribution.FirstDay
  }

  /**
   * Place the ordered tasks starting at `start`, around `blocked`.
   * Completed tasks are skipped. Input order breaks urgency ties.
   *
   * @throws InvalidInputError when start or any block boundary is not a
   *   timezone-aware instant
   */
  place(
    tasks: readonly Task[],
    start: InstantInput,
    blocked: readonly BlockedIntervalInput[] = [],
  ): PlacementResult {
    const startMs = toInstant(start, 'start').getTime()
    const blocks = normalizeBlocks(blocked)

    const items: WorkItem[] = tasks
      .filter(task => !task.completed)
      .map((task, order) => ({ task, deadline: getEffectiveDeadline(task), order, remainingMs: getTaskDurationMs(task) }))

    const stepLimit = this.maxSegments ?? placementStepLimit(items.length, blocks.length)
    const pending = [...items]
    const segments: RawSegment[] = []
    let cursor = startMs

    while (pending.length > 0 && segments.length < stepLimit) {
      cursor = advancePastBlocked(cursor, blocks)
      const item = this.selectNext(pending, cursor, blocks)
      if (!item) break

      const next = findNextBlock(cursor, blocks)
      const end = next
        ? Math.min(next.start.getTime(), cursor + item.remainingMs)
        : cursor + item.remainingMs

      segments.push({ item, start: cursor, end })
      item.remainingMs -= end - cursor
      cursor = end

      if (item.remainingMs <= 0) {
        pending.splice(pending.indexOf(item), 1)
      }
    }

    const result = this.finalize(segments, blocks, pending, stepLimit)

    logger.scheduler.info('Placement complete', {
      taskCount: items.length,
      segmentCount: result.scheduledTasks.length,
      conflictCount: result.conflicts.length,
      exhausted: result.exhausted,
    }, 'placement-run')

    return result
  }

  /**
   * Single-day placement. The DaySchedule is dated by the start instant's
   * calendar day and carries every segment of the run.
   */
  scheduleDay(
    tasks: readonly Task[],
    start: InstantInput,
    blocked: readonly BlockedIntervalInput[] = [],
  ): DaySchedule {
    const startInstant = toInstant(start, 'start')
    const result = this.place(tasks, startInstant, blocked)

    return {
      date: calendarDateOf(startInstant, this.timeZone),
      scheduledTasks: result.scheduledTasks,
      blockedTime: result.blockedTime,
      conflicts: result.conflicts,
    }
  }

  /**
   * One placement run across `numDays` days (plus one day of overflow
   * room), partitioned into per-day views.
   */
  scheduleContinuous(
    tasks: readonly Task[],
    start: InstantInput,
    numDays: number,
    blockedForDay: BlockedTimeLookup,
  ): DaySchedule[] {
    if (!Number.isInteger(numDays) || numDays < 1) {
      throw new InvalidInputError(`numDays must be a positive integer (got ${numDays})`, 'numDays')
    }

    const startInstant = toInstant(start, 'start')
    const span = calendarDateRange(calendarDateOf(startInstant, this.timeZone), numDays + 1)
    const blocked = span.flatMap(date => blockedForDay(date))

    logger.scheduler.debug('Continuous placement', {
      firstDay: span[0],
      days: numDays,
      blockCount: blocked.length,
    }, 'placement-continuous')

    const result = this.place(tasks, startInstant, blocked)

    return partitionByDay(result, span.slice(0, numDays), {
      timeZone: this.timeZone,
      conflictAttribution: this.conflictAttribution,
    })
  }

  // ============================================================================
  // SELECTION
  // ============================================================================

  /**
   * Most urgent candidate that does not push another task's critical
   * deadline out of reach; the most urgent one when none is safe.
   */
  private selectNext(pending: readonly WorkItem[], cursor: number, blocks: readonly TimeBlock[]): WorkItem | undefined {
    const ranked: RankedItem[] = pending.map(item => ({ item, score: calculateUrgencyScore(item, cursor, blocks) }))

    let mostUrgent: RankedItem | undefined
    for (const entry of ranked) {
      if (!mostUrgent || byUrgency(entry, mostUrgent) < 0) mostUrgent = entry
    }
    if (!mostUrgent) return undefined

    // The most urgent candidate is usually safe; rank the rest only when it is not
    const safe = this.isSafe(mostUrgent.item, pending, cursor, blocks)
      ? mostUrgent
      : [...ranked].sort(byUrgency).find(({ item }) => this.isSafe(item, pending, cursor, blocks))

    if (!safe) {
      logger.scheduler.debug(`No safe candidate, taking most urgent ${mostUrgent.item.task.id}`, {
        cursor: new Date(cursor).toISOString(),
      }, 'placement-select')
      return mostUrgent.item
    }

    logger.scheduler.debug(`Selected ${safe.item.task.id}`, {
      rank: safe.score.rank,
      score: safe.score.value,
      cursor: new Date(cursor).toISOString(),
    }, 'placement-select')

    return safe.item
  }

  private isSafe(
    candidate: WorkItem,
    active: readonly WorkItem[],
    cursor: number,
    blocks: readonly TimeBlock[],
  ): boolean {
    const finish = estimateCompletionTime(cursor, candidate.remainingMs, blocks)

    return active.every(other => {
      if (other === candidate || !other.deadline) return true
      if (!isCriticalDeadline(other, finish, blocks)) return true
      // Only deadlines that are still reachable now can be lost by this choice
      if (!isDeadlineFeasible(other, cursor, blocks)) return true
      return isDeadlineFeasible(other, finish, blocks)
    })
  }

  // ============================================================================
  // FINALIZATION
  // ============================================================================

  private finalize(
    segments: readonly RawSegment[],
    blocks: readonly TimeBlock[],
    leftover: readonly WorkItem[],
    stepLimit: number,
  ): PlacementResult {
    const byTask = new Map<WorkItem, RawSegment[]>()
    for (const segment of segments) {
      const group = byTask.get(segment.item)
      if (group) {
        group.push(segment)
      } else {
        byTask.set(segment.item, [segment])
      }
    }

    const scheduledBySegment = new Map<RawSegment, ScheduledTask>()
    const violations: DeadlineViolation[] = []

    for (const [item, group] of byTask) {
      group.sort((a, b) => a.start - b.start)
      const last = group[group.length - 1]
      if (!last) continue

      const finished = item.remainingMs <= 0
      const completedAt = new Date(last.end)
      const { task } = item
      const violatesDeadlineUser = finished && task.deadlineUser !== undefined && last.end > task.deadlineUser.getTime()
      const violatesDeadlineExternal = finished && task.deadlineExternal !== undefined && last.end > task.deadlineExternal.getTime()

      if (violatesDeadlineUser && task.deadlineUser) {
        violations.push(this.describeViolation(task, DeadlineKind.User, completedAt, task.deadlineUser))
      }
      if (violatesDeadlineExternal && task.deadlineExternal) {
        violations.push(this.describeViolation(task, DeadlineKind.External, completedAt, task.deadlineExternal))
      }

      // Work cut off by exhaustion is reported as segments of an unfinished whole
      const multiple = group.length > 1 || !finished
      group.forEach((segment, index) => {
        scheduledBySegment.set(segment, createScheduledTask({
          task,
          start: new Date(segment.start),
          end: new Date(segment.end),
          violatesDeadlineUser,
          violatesDeadlineExternal,
          ...(multiple ? { segment: { index: index + 1, total: group.length } } : {}),
        }))
      })
    }

    const scheduledTasks = segments.flatMap(segment => {
      const scheduled = scheduledBySegment.get(segment)
      return scheduled ? [scheduled] : []
    })

    const unscheduled: UnscheduledWork[] = leftover.map(item => ({
      task: item.task,
      remainingMinutes: item.remainingMs / MS_PER_MINUTE,
    }))

    const conflicts = violations.map(violation => violation.message)
    const exhausted = unscheduled.length > 0

    if (exhausted) {
      const titles = unscheduled.map(entry => `'${describeTask(entry.task)}'`).join(', ')
      conflicts.push(`Scheduling stopped after ${stepLimit} segments; unscheduled work remains for ${titles}`)
      logger.scheduler.warn('Placement exhausted before all work was placed', {
        maxSegments: stepLimit,
        unscheduled: unscheduled.map(entry => ({ taskId: entry.task.id, remainingMinutes: entry.remainingMinutes })),
      }, 'placement-exhausted')
    }

    return {
      scheduledTasks,
      blockedTime: blocks,
      conflicts,
      violations,
      unscheduled,
      exhausted,
    }
  }

  private describeViolation(task: Task, kind: DeadlineKind, completedAt: Date, deadline: Date): DeadlineViolation {
    const message = `Task '${describeTask(task)}' ends at ${formatDateTime(completedAt, this.timeZone)} ` +
      `but ${kind} deadline is ${formatDateTime(deadline, this.timeZone)}`

    return { task, kind, completedAt, deadline, message }
  }
}

function byUrgency(a: RankedItem, b: RankedItem): number {
  return compareUrgency(a.score, b.score) || a.item.order - b.item.order
}

function describeTask(task: Task): string {
  return task.title || task.id
}

/**
 * Validate boundaries and sort by start. Overlaps are kept as given.
 */
function normalizeBlocks(blocked: readonly BlockedIntervalInput[]): TimeBlock[] {
  const blocks = blocked.map((block, index) => {
    const start = toInstant(block.start, `blocked[${index}].start`)
    const end = toInstant(block.end, `blocked[${index}].end`)
    return createTimeBlock({ start, end, kind: block.kind, ...(block.label ? { label: block.label } : {}) })
  })

  return sortTimeBlocks(blocks)
}

// ============================================================================
// CONVENIENCE
// ============================================================================

export function placeTasks(
  tasks: readonly Task[],
  start: InstantInput,
  blocked: readonly BlockedIntervalInput[] = [],
  options: PlacementOptions = {},
): PlacementResult {
  return new PlacementEngine(options).place(tasks, start, blocked)
}

export function scheduleDay(
  tasks: readonly Task[],
  start: InstantInput,
  blocked: readonly BlockedIntervalInput[] = [],
  options: PlacementOptions = {},
): DaySchedule {
  return new PlacementEngine(options).scheduleDay(tasks, start, blocked)
}

export function scheduleContinuous(
  tasks: readonly Task[],
  start: InstantInput,
  numDays: number,
  blockedForDay: BlockedTimeLookup,
  options: PlacementOptions = {},
): DaySchedule[] {
  return new PlacementEngine(options).scheduleContinuous(tasks, start, numDays, blockedForDay)
}
