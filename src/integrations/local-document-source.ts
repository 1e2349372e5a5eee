/**
 * Reads project documents (one JSON file per project) from disk, either as
 * a Docs API export or as an already flattened document structure.
 */

import { readFile } from 'node:fs/promises'
import { isAbsolute, resolve } from 'node:path'
import { z } from 'zod'
import { logger } from '@/logger'
import { ParagraphStyle } from '@shared/document-types'
import type { DocumentStructure } from '@shared/document-types'
import { DocumentSourceError, getErrorMessage } from '@shared/errors'
import { createProjectTodo } from '@shared/task-aggregation'
import type { ProjectTodoList } from '@shared/task-aggregation'
import { DEFAULT_EXCLUDED_TABS, deriveTodoList } from '@shared/todo-deriver'
import { convertDocsExport, isDocsExport, parseDocsExport } from './docs-export'
import type { TaskSource, TaskSourceResult } from './task-source'

export const LOCAL_DOCS_SOURCE = 'local-docs'

/**
 * Schema for one paragraph's bullet
 */
const bulletSchema = z.object({
  listId: z.string().min(1).optional(),
  nestingLevel: z.number().int().min(0).default(0),
  hasStrikethrough: z.boolean().default(false),
})

const paragraphSchema = z.object({
  text: z.string(),
  style: z.nativeEnum(ParagraphStyle).default(ParagraphStyle.Normal),
  bullet: bulletSchema.optional(),
})

const tabSchema = z.object({
  tabId: z.string().min(1),
  title: z.string(),
  index: z.number().int().min(0).default(0),
  checkboxListId: z.string().min(1).nullable().optional(),
  paragraphs: z.array(paragraphSchema).default([]),
})

/**
 * Schema for an exported document
 */
export const documentStructureSchema = z.object({
  title: z.string().min(1),
  documentId: z.string().min(1),
  tabs: z.array(tabSchema).default([]),
})

/**
 * @throws DocumentSourceError listing every failing field
 */
export function parseDocumentStructure(raw: unknown, path?: string): DocumentStructure {
  const result = documentStructureSchema.safeParse(raw)
  if (!result.success) {
    const issues = result.error.issues.map(issue => {
      const where = issue.path.join('.')
      return where ? `${where}: ${issue.message}` : issue.message
    })
    throw new DocumentSourceError(`Invalid document${path ? ` ${path}` : ''}: ${issues.join('; ')}`, path)
  }
  return result.data
}

/**
 * @throws DocumentSourceError when the file is missing, unreadable or invalid
 */
export async function readDocumentFile(path: string): Promise<DocumentStructure> {
  let text: string
  try {
    text = await readFile(path, 'utf8')
  } catch (error) {
    throw new DocumentSourceError(`Cannot read document ${path}: ${getErrorMessage(error)}`, path, { cause: error })
  }

  let raw: unknown
  try {
    raw = JSON.parse(text)
  } catch (error) {
    throw new DocumentSourceError(`Document is not valid JSON: ${path}`, path, { cause: error })
  }

  if (isDocsExport(raw)) {
    return parseDocumentStructure(convertDocsExport(parseDocsExport(raw, path)), path)
  }
  return parseDocumentStructure(raw, path)
}

export interface LocalDocumentSourceOptions {
  paths: readonly string[]
  /** Relative paths resolve against this directory (default: cwd) */
  baseDir?: string
  excludeTabTitles?: readonly string[]
  /** Zone for deadlines written without an offset */
  timeZone?: string
}

export class LocalDocumentSource implements TaskSource {
  readonly name = LOCAL_DOCS_SOURCE

  constructor(private readonly options: LocalDocumentSourceOptions) {}

  async loadProjects(): Promise<TaskSourceResult> {
    const projects: ProjectTodoList[] = []
    const failures: DocumentSourceError[] = []

    for (const path of this.resolvePaths()) {
      try {
        projects.push(await this.loadProject(path))
      } catch (error) {
        if (!(error instanceof DocumentSourceError)) throw error
        logger.parser.warn('Skipping document', { path, error: error.message }, 'document-skip')
        failures.push(error)
      }
    }

    logger.parser.info('Loaded local documents', {
      projects: projects.length,
      failures: failures.length,
    }, 'document-load')

    return { projects, failures }
  }

  private resolvePaths(): string[] {
    const baseDir = this.options.baseDir ?? process.cwd()
    return this.options.paths.map(path => (isAbsolute(path) ? path : resolve(baseDir, path)))
  }

  private async loadProject(path: string): Promise<ProjectTodoList> {
    const document = await readDocumentFile(path)
    const tasks = deriveTodoList(document, {
      excludeTabTitles: this.options.excludeTabTitles ?? DEFAULT_EXCLUDED_TABS,
      timeZone: this.options.timeZone,
      source: LOCAL_DOCS_SOURCE,
    })

    return createProjectTodo(document.title, tasks, {
      documentId: document.documentId,
      source: LOCAL_DOCS_SOURCE,
    })
  }
}
