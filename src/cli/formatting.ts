/**
 * Terminal presentation
 *
 * Renderers return lines; callers decide where they go. Colour comes from
 * chalk and disappears on its own when the stream is not a TTY.
 */

import chalk from 'chalk'
import { TimeBlockKind, TimelineEntryType } from '@shared/enums'
import { CalendarDate, formatClockTime, formatDateTime } from '@shared/datetime-types'
import type { ProjectContext } from '@shared/task-aggregation'
import { MS_PER_MINUTE, getEffectiveDeadline } from '@shared/types'
import type { ScheduledTask, Task, TimeBlock } from '@shared/types'

export type TimelineEntry =
  | { type: TimelineEntryType.Task; start: Date; end: Date; scheduled: ScheduledTask }
  | { type: TimelineEntryType.Blocked; start: Date; end: Date; block: TimeBlock }
  | { type: TimelineEntryType.Empty; start: Date; end: Date }

export interface TimelineSource {
  scheduledTasks: readonly ScheduledTask[]
  blockedTime: readonly TimeBlock[]
}

export interface SyncSummary {
  projects: number
  total: number
  incomplete: number
  completed: number
}

export const DAY_SEPARATOR = '─'.repeat(60)

/**
 * "2h 30m", "45m", "2h", "0m"; negative amounts read "overdue".
 */
export function formatDuration(minutes: number): string {
  if (minutes < 0) return 'overdue'

  const total = Math.floor(minutes)
  const hours = Math.floor(total / 60)
  const rest = total % 60

  const parts: string[] = []
  if (hours > 0) parts.push(`${hours}h`)
  if (rest > 0 || hours === 0) parts.push(`${rest}m`)
  return parts.join(' ')
}

// ============================================================================
// TIMELINE
// ============================================================================

/**
 * Tasks and blocked time in start order, with the gaps inside
 * [windowStart, windowEnd] filled by empty entries.
 */
export function buildTimeline(day: TimelineSource, windowStart: Date, windowEnd: Date): TimelineEntry[] {
  const occupied: TimelineEntry[] = [
    ...day.scheduledTasks.map(scheduled => ({
      type: TimelineEntryType.Task as const,
      start: scheduled.start,
      end: scheduled.end,
      scheduled,
    })),
    ...day.blockedTime.map(block => ({
      type: TimelineEntryType.Blocked as const,
      start: block.start,
      end: block.end,
      block,
    })),
  ].sort((a, b) => a.start.getTime() - b.start.getTime())

  const timeline: TimelineEntry[] = []
  let cursor = windowStart

  for (const entry of occupied) {
    if (cursor < entry.start && cursor < windowEnd) {
      const gapEnd = entry.start < windowEnd ? entry.start : windowEnd
      timeline.push({ type: TimelineEntryType.Empty, start: cursor, end: gapEnd })
    }
    timeline.push(entry)
    if (entry.end > cursor) cursor = entry.end
  }

  if (cursor < windowEnd) {
    timeline.push({ type: TimelineEntryType.Empty, start: cursor, end: windowEnd })
  }

  return timeline
}

function timeRange(start: Date, end: Date, timeZone: string): string {
  return `${formatClockTime(start, timeZone)} – ${formatClockTime(end, timeZone)}`
}

function blockIcon(kind: TimeBlockKind): string {
  switch (kind) {
    case TimeBlockKind.Break:
      return '☕'
    case TimeBlockKind.Sleep:
      return '😴'
    case TimeBlockKind.Meeting:
      return '📅'
    default:
      return '🚫'
  }
}

function blockStyle(kind: TimeBlockKind): (text: string) => string {
  switch (kind) {
    case TimeBlockKind.Break:
      return chalk.yellow.dim
    case TimeBlockKind.Sleep:
      return chalk.blue.dim
    case TimeBlockKind.Meeting:
      return chalk.magenta.dim
    default:
      return chalk.dim
  }
}

function renderTaskEntry(prefix: string, range: string, scheduled: ScheduledTask, timeZone: string): string[] {
  const { task } = scheduled
  const marks: string[] = []
  if (scheduled.violatesDeadlineUser) marks.push('⚠️')
  if (scheduled.violatesDeadlineExternal) marks.push('🔴')

  let headline = `${chalk.dim(prefix)}${chalk.bold.cyan(range)}  📋 ${chalk.bold(task.title || task.id)}`
  if (scheduled.isSegment) {
    headline += chalk.dim(` (part ${scheduled.segmentIndex}/${scheduled.totalSegments})`)
  }
  if (marks.length > 0) headline += ` ${marks.join(' ')}`

  const lines = [headline]

  const origin: string[] = []
  if (task.project) origin.push(`[${task.project}]`)
  if (task.section) origin.push(`• ${task.section}`)
  if (origin.length > 0) lines.push(`    ${chalk.dim(origin.join(' '))}`)

  lines.push(
    `    ${chalk.dim('Duration:')} ${formatDuration(task.estimatedDuration)} ${chalk.dim('|')} ${chalk.dim('ID:')} ${chalk.yellow(task.id)}`,
  )

  const shown = task.deadlineUser
    ? { label: 'User', at: task.deadlineUser }
    : task.deadlineExternal
      ? { label: 'External', at: task.deadlineExternal }
      : undefined

  if (shown) {
    const text = formatDateTime(shown.at, timeZone)
    lines.push(`    ${chalk.dim(`${shown.label} deadline:`)} ${marks.length > 0 ? chalk.red(text) : text}`)
  }

  lines.push('')
  return lines
}

export function renderTimelineEntry(index: number, entry: TimelineEntry, timeZone: string): string[] {
  const prefix = `${String(index).padStart(2)}. `
  const range = timeRange(entry.start, entry.end, timeZone)

  switch (entry.type) {
    case TimelineEntryType.Task:
      return renderTaskEntry(prefix, range, entry.scheduled, timeZone)
    case TimelineEntryType.Blocked: {
      const { block } = entry
      const style = blockStyle(block.kind)
      return [`${chalk.dim(prefix)}${chalk.cyan.dim(range)}  ${blockIcon(block.kind)} ${style(block.label ?? block.kind)}`]
    }
    case TimelineEntryType.Empty:
      return [`${chalk.dim(prefix)}${chalk.dim(range)}  ${chalk.dim.italic('(empty)')}`]
  }
}

export function renderTimeline(entries: readonly TimelineEntry[], timeZone: string): string[] {
  return [
    chalk.bold('⏰ Timeline'),
    '',
    ...entries.flatMap((entry, offset) => renderTimelineEntry(offset + 1, entry, timeZone)),
  ]
}

// ============================================================================
// SCHEDULE
// ============================================================================

export function renderScheduleHeader(date: CalendarDate, workStart: Date, workEnd: Date, timeZone: string): string[] {
  return [
    '',
    `📅 ${chalk.bold(`Schedule for ${date}`)}`,
    `   Work hours: ${chalk.cyan(timeRange(workStart, workEnd, timeZone))} ${chalk.dim(`(${timeZone})`)}`,
    '',
  ]
}

export function renderConflicts(conflicts: readonly string[]): string[] {
  return [
    '',
    chalk.bold.yellow('⚠️  Deadline conflicts:'),
    '',
    ...conflicts.map(conflict => `   ${chalk.yellow('•')} ${conflict}`),
    '',
  ]
}

export function renderFooter(totalMinutes: number, scheduledCount: number, conflictCount: number): string[] {
  let summary = `${chalk.dim('Total work time:')} ${chalk.bold(formatDuration(totalMinutes))}` +
    `${chalk.dim('  •  ')}${chalk.dim('Tasks scheduled:')} ${chalk.bold(String(scheduledCount))}`

  if (conflictCount > 0) {
    summary += `${chalk.dim('  •  ')}${chalk.yellow('⚠️ Conflicts:')} ${chalk.bold.yellow(String(conflictCount))}`
  }

  return ['', summary, '']
}

// ============================================================================
// SYNC
// ============================================================================

export function renderProjectLine(projectName: string, taskCount: number): string {
  return `  ${chalk.green('✓')} ${chalk.bold(projectName)}: ${chalk.cyan(String(taskCount))} tasks`
}

export function renderSyncSummary(summary: SyncSummary): string[] {
  const row = (label: string, value: number): string => `  ${chalk.dim(label.padEnd(12))}${chalk.bold.cyan(String(value))}`

  return [
    '',
    `✓ ${chalk.bold.green('Sync complete!')}`,
    '',
    row('Projects', summary.projects),
    row('Total tasks', summary.total),
    row('Incomplete', summary.incomplete),
    row('Completed', summary.completed),
    '',
  ]
}

// ============================================================================
// EXPLAIN
// ============================================================================

export function renderTaskDetails(task: Task, context: ProjectContext, timeZone: string): string[] {
  const deadline = (label: string, at: Date | undefined): string =>
    `   ${chalk.dim(`${label}:`)} ${at ? formatDateTime(at, timeZone) : chalk.dim.italic('Not set')}`

  const effective = getEffectiveDeadline(task)
  const lines = [
    '',
    `📝 ${chalk.dim('Task:')} ${chalk.bold(task.title || task.id)}`,
    `   ${chalk.dim('ID:')} ${chalk.yellow(task.id)}`,
    '',
    chalk.bold('📂 Origin'),
    `   ${chalk.dim('Project:')} ${context.projectName}`,
  ]

  if (task.section) lines.push(`   ${chalk.dim('Section:')} ${task.section}`)
  lines.push(`   ${chalk.dim('Source:')} ${context.source}`)
  if (context.documentId) lines.push(`   ${chalk.dim('Document ID:')} ${chalk.cyan(context.documentId)}`)

  lines.push(
    '',
    chalk.bold('⏱️  Duration & Deadlines'),
    `   ${chalk.dim('Estimated duration:')} ${formatDuration(task.estimatedDuration)}`,
    deadline('User deadline', task.deadlineUser),
    deadline('External deadline', task.deadlineExternal),
  )
  if (effective) {
    lines.push(`   ${chalk.dim('Effective deadline:')} ${chalk.bold(`${formatDateTime(effective.at, timeZone)} (${effective.kind})`)}`)
  }

  lines.push(
    '',
    chalk.bold('📊 Status'),
    `   ${chalk.dim('Completed:')} ${task.completed ? chalk.green('✓ Yes') : chalk.dim('No')}`,
    '',
  )

  return lines
}

export function renderQueuePosition(task: Task, position: number | undefined, total: number, now: Date): string[] {
  if (position === undefined) {
    return [chalk.dim('Task is completed or not in the active queue'), '']
  }

  const effective = getEffectiveDeadline(task)
  const deadlineLine = effective
    ? `   ${chalk.dim('•')} Time until deadline: ${chalk.yellow(formatDuration((effective.at.getTime() - now.getTime()) / MS_PER_MINUTE))}`
    : `   ${chalk.dim('•')} No deadline set ${chalk.dim('(lower priority)')}`

  return [
    chalk.bold('📍 Scheduling Position'),
    `   ${chalk.dim('Position in queue:')} ${chalk.bold.cyan(String(position))} ${chalk.dim('of')} ${total}`,
    '',
    `   ${chalk.dim('Explanation:')}`,
    `   ${chalk.dim('•')} External deadlines come first, then user deadlines, then the rest by duration`,
    `   ${chalk.dim('•')} This task has a ${chalk.cyan(formatDuration(task.estimatedDuration))} duration`,
    deadlineLine,
    '',
  ]
}

// ============================================================================
// MESSAGES
// ============================================================================

export function formatError(message: string): string {
  return `${chalk.bold.red('Error:')} ${message}`
}

export function formatWarning(message: string): string {
  return `${chalk.yellow('⚠️')}  ${message}`
}

export function formatSuccess(message: string): string {
  return `${chalk.green('✓')} ${message}`
}

export function formatInfo(message: string): string {
  return `${chalk.cyan('ℹ')}  ${message}`
}
