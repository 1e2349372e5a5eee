/**
 * Where project TODO lists come from
 */

import type { DocumentSourceError } from '@shared/errors'
import type { ProjectTodoList } from '@shared/task-aggregation'

export interface TaskSourceResult {
  projects: ProjectTodoList[]
  /** Documents that could not be loaded; the rest still count */
  failures: DocumentSourceError[]
}

export interface TaskSource {
  readonly name: string
  loadProjects(): Promise<TaskSourceResult>
}
