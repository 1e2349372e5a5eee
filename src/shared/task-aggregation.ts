/**
 * Project-level task aggregation
 *
 * Each document yields one ProjectTodoList. Aggregation flattens them into
 * a single pool while remembering which project every task came from.
 */

import { ProjectId } from './id-types'
import { Task, withTaskFields } from './types'

export interface ProjectContext {
  readonly projectId: ProjectId
  readonly projectName: string
  readonly source: string
  readonly documentId?: string
}

export interface ProjectTodoList {
  readonly context: ProjectContext
  readonly tasks: readonly Task[]
}

export interface AggregatedTask {
  readonly task: Task
  readonly context: ProjectContext
}

export interface ProjectTodoOptions {
  projectId?: string
  source?: string
  documentId?: string
}

export const UNNAMED_PROJECT = 'unnamed_project'

/**
 * Stable identifier from a display name: "Client Website (v2)" -> "client_website_v2"
 */
export function normalizeProjectName(name: string): string {
  const replaced = name
    .trim()
    .toLowerCase()
    .replace(/[^\p{L}\p{N}_-]/gu, '_')

  const collapsed = replaced
    .split('_')
    .filter(part => part.length > 0)
    .join('_')

  return collapsed || UNNAMED_PROJECT
}

export function createProjectTodo(
  projectName: string,
  tasks: readonly Task[],
  options: ProjectTodoOptions = {},
): ProjectTodoList {
  return {
    context: {
      projectId: ProjectId(options.projectId || normalizeProjectName(projectName)),
      projectName,
      source: options.source ?? 'local',
      ...(options.documentId ? { documentId: options.documentId } : {}),
    },
    tasks: [...tasks],
  }
}

export function projectKey(context: ProjectContext): string {
  return `${context.projectId}@${context.source}`
}

/**
 * Flatten project lists into one collection. Tasks without a project label
 * come back as copies carrying the supplying project's name; the inputs are
 * left untouched, so repeated calls give equal results.
 */
export function aggregateProjectTodos(lists: readonly ProjectTodoList[]): AggregatedTask[] {
  const aggregated: AggregatedTask[] = []

  for (const list of lists) {
    for (const task of list.tasks) {
      const enriched = task.project ? task : withTaskFields(task, { project: list.context.projectName })
      aggregated.push({ task: enriched, context: list.context })
    }
  }

  return aggregated
}

export function getTaskPool(aggregated: readonly AggregatedTask[]): Task[] {
  return aggregated.map(entry => entry.task)
}

export function getTasksByProject(aggregated: readonly AggregatedTask[]): Map<string, Task[]> {
  const byProject = new Map<string, Task[]>()

  for (const entry of aggregated) {
    const key = projectKey(entry.context)
    const bucket = byProject.get(key)
    if (bucket) {
      bucket.push(entry.task)
    } else {
      byProject.set(key, [entry.task])
    }
  }

  return byProject
}

/**
 * Unique project contexts in first-seen order. Two contexts are the same
 * project when id and source match.
 */
export function getAllProjects(aggregated: readonly AggregatedTask[]): ProjectContext[] {
  const seen = new Set<string>()
  const projects: ProjectContext[] = []

  for (const entry of aggregated) {
    const key = projectKey(entry.context)
    if (!seen.has(key)) {
      seen.add(key)
      projects.push(entry.context)
    }
  }

  return projects
}
