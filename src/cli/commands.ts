/**
 * Command implementations
 *
 * Each command loads the configured documents afresh, so one-shot runs
 * need no state between invocations. Output goes through `print`.
 */

import { logger } from '@/logger'
import { configToTimeBlocks, getWorkWindow } from '@/config'
import type { SlacklineConfig } from '@/config'
import type { TaskSource } from '@/integrations/task-source'
import { CalendarDate, addCalendarDays, calendarDateOf } from '@shared/datetime-types'
import { ConfigError, InvalidInputError } from '@shared/errors'
import { PlacementEngine } from '@shared/placement-engine'
import { ProjectTodoList, aggregateProjectTodos, getTaskPool } from '@shared/task-aggregation'
import { getQueuePosition, prioritizeTasks } from '@shared/task-prioritizer'
import { DaySchedule, Task, TimeBlock, getScheduledMinutes } from '@shared/types'
import {
  DAY_SEPARATOR,
  buildTimeline,
  formatWarning,
  renderConflicts,
  renderFooter,
  renderProjectLine,
  renderQueuePosition,
  renderScheduleHeader,
  renderSyncSummary,
  renderTaskDetails,
  renderTimeline,
} from './formatting'

export interface CommandContext {
  config: SlacklineConfig
  configPath: string
  source: TaskSource
  now: () => Date
  print: (line: string) => void
}

export const DEFAULT_SCHEDULE_DAYS = 3

/**
 * One calendar day as the CLI shows it: the visible window plus the
 * segments and blocked time that fall into it.
 */
export interface DayPlan {
  date: CalendarDate
  windowStart: Date
  windowEnd: Date
  schedule: DaySchedule
}

function later(a: Date, b: Date): Date {
  return a > b ? a : b
}

function blocksAround(config: SlacklineConfig, date: CalendarDate): TimeBlock[] {
  // Yesterday's overnight windows may still be running
  return [addCalendarDays(date, -1), date].flatMap(day => configToTimeBlocks(config, day))
}

/**
 * Keep blocked time overlapping the window or the day's work.
 */
function visibleBlocks(schedule: DaySchedule, windowStart: Date, windowEnd: Date): TimeBlock[] {
  const from = schedule.scheduledTasks.reduce((earliest, s) => (s.start < earliest ? s.start : earliest), windowStart)
  const to = schedule.scheduledTasks.reduce((latest, s) => later(latest, s.end), windowEnd)
  return schedule.blockedTime.filter(block => block.start < to && block.end > from)
}

/**
 * Today from max(now, work start). Work spilling past midnight is placed
 * but not shown.
 */
export function planToday(config: SlacklineConfig, tasks: readonly Task[], now: Date): DayPlan {
  const timeZone = config.scheduling.timezone
  const today = calendarDateOf(now, timeZone)
  const work = getWorkWindow(config, today)
  const windowStart = later(now, work.start)

  const blocked = [...blocksAround(config, today), ...configToTimeBlocks(config, addCalendarDays(today, 1))]
  const day = new PlacementEngine({ timeZone }).scheduleDay(tasks, windowStart, blocked)

  const todays: DaySchedule = {
    ...day,
    date: today,
    scheduledTasks: day.scheduledTasks.filter(segment => calendarDateOf(segment.start, timeZone) === today),
  }

  return {
    date: today,
    windowStart,
    windowEnd: work.end,
    schedule: { ...todays, blockedTime: visibleBlocks(todays, windowStart, work.end) },
  }
}

/**
 * One continuous run over `days` days starting at max(now, today's work start).
 */
export function planDays(config: SlacklineConfig, tasks: readonly Task[], now: Date, days: number): DayPlan[] {
  const timeZone = config.scheduling.timezone
  const today = calendarDateOf(now, timeZone)
  const start = later(now, getWorkWindow(config, today).start)

  const schedules = new PlacementEngine({ timeZone }).scheduleContinuous(
    tasks,
    start,
    days,
    date => (date === today ? blocksAround(config, date) : configToTimeBlocks(config, date)),
  )

  return schedules.map((schedule, offset) => {
    const work = getWorkWindow(config, schedule.date)
    const windowStart = offset === 0 ? start : work.start
    return {
      date: schedule.date,
      windowStart,
      windowEnd: work.end,
      schedule: { ...schedule, blockedTime: visibleBlocks(schedule, windowStart, work.end) },
    }
  })
}

/**
 * @throws InvalidInputError unless the value is a positive integer
 */
export function parseDayCount(value: string | undefined): number {
  if (value === undefined) return DEFAULT_SCHEDULE_DAYS
  const days = Number(value)
  if (!/^\d+$/.test(value.trim()) || !Number.isInteger(days) || days < 1) {
    throw new InvalidInputError(`Number of days must be a positive integer (got "${value}")`, 'days')
  }
  return days
}

async function loadProjects(context: CommandContext): Promise<ProjectTodoList[]> {
  if (context.config.documents.paths.length === 0) {
    throw new ConfigError(`No documents configured. Add paths under documents.paths in ${context.configPath}`)
  }

  const { projects, failures } = await context.source.loadProjects()
  for (const failure of failures) {
    context.print(formatWarning(failure.message))
  }
  return projects
}

function printDay(context: CommandContext, plan: DayPlan): void {
  const { timezone } = context.config.scheduling
  const lines = [
    ...renderScheduleHeader(plan.date, plan.windowStart, plan.windowEnd, timezone),
    ...renderTimeline(buildTimeline(plan.schedule, plan.windowStart, plan.windowEnd), timezone),
  ]
  lines.forEach(line => context.print(line))
}

// ============================================================================
// COMMANDS
// ============================================================================

export async function syncCommand(context: CommandContext): Promise<void> {
  const projects = await loadProjects(context)

  for (const project of projects) {
    context.print(renderProjectLine(project.context.projectName, project.tasks.length))
  }

  const tasks = projects.flatMap(project => project.tasks)
  const completed = tasks.filter(task => task.completed).length

  renderSyncSummary({
    projects: projects.length,
    total: tasks.length,
    incomplete: tasks.length - completed,
    completed,
  }).forEach(line => context.print(line))
}

export async function todayCommand(context: CommandContext): Promise<void> {
  const projects = await loadProjects(context)
  const tasks = prioritizeTasks(getTaskPool(aggregateProjectTodos(projects)))

  const plan = planToday(context.config, tasks, context.now())
  printDay(context, plan)

  const { scheduledTasks, conflicts } = plan.schedule
  if (conflicts.length > 0) {
    renderConflicts(conflicts).forEach(line => context.print(line))
  }

  const totalMinutes = scheduledTasks.reduce((sum, segment) => sum + getScheduledMinutes(segment), 0)
  renderFooter(totalMinutes, scheduledTasks.length, conflicts.length).forEach(line => context.print(line))
}

export async function scheduleCommand(context: CommandContext, daysArgument?: string): Promise<void> {
  const days = parseDayCount(daysArgument)
  const projects = await loadProjects(context)
  const tasks = prioritizeTasks(getTaskPool(aggregateProjectTodos(projects)))

  const plans = planDays(context.config, tasks, context.now(), days)
  logger.cli.debug('Multi-day schedule built', { days, taskCount: tasks.length }, 'cli-schedule')

  plans.forEach((plan, offset) => {
    if (offset > 0) context.print(`\n${DAY_SEPARATOR}\n`)
    printDay(context, plan)
  })

  const conflicts = plans.flatMap(plan => plan.schedule.conflicts)
  if (conflicts.length > 0) {
    context.print(`\n${DAY_SEPARATOR}\n`)
    renderConflicts(conflicts).forEach(line => context.print(line))
  }
}

/**
 * @throws InvalidInputError when no loaded task has the id
 */
export async function explainCommand(context: CommandContext, taskId: string): Promise<void> {
  const projects = await loadProjects(context)
  const aggregated = aggregateProjectTodos(projects)

  const match = aggregated.find(entry => entry.task.id === taskId)
  if (!match) {
    throw new InvalidInputError(`Task with ID '${taskId}' not found`, 'taskId')
  }

  const ordered = prioritizeTasks(getTaskPool(aggregated))
  const position = getQueuePosition(ordered, taskId)
  const queued = ordered.filter(task => !task.completed).length
  const { timezone } = context.config.scheduling

  const lines = [
    ...renderTaskDetails(match.task, match.context, timezone),
    ...renderQueuePosition(match.task, position, queued, context.now()),
  ]
  lines.forEach(line => context.print(line))
}
