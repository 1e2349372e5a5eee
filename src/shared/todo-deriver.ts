/**
 * Derives a project's TODO list from an exported document.
 *
 * No sorting happens here; ordering is global and belongs to the prioritizer.
 */

import { logger } from '@/logger'
import { DocumentStructure, DocumentTab, isHeading } from './document-types'
import { TaskParseError } from './errors'
import { stableTaskId } from './id-types'
import { discoverCheckboxListId, parseTaskLine } from './task-parser'
import { Task, withTaskFields } from './types'

export const DEFAULT_EXCLUDED_TABS: readonly string[] = ['todo']

export interface DeriveOptions {
  /** Tab titles to skip, case-insensitive (default ["todo"]) */
  excludeTabTitles?: readonly string[]
  /** Zone for deadlines written without an offset */
  timeZone?: string
  source?: string
}

function deriveTabTasks(document: DocumentStructure, tab: DocumentTab, options: DeriveOptions): Task[] {
  const title = tab.title.trim()
  const checkboxListId = tab.checkboxListId === undefined
    ? discoverCheckboxListId(tab.paragraphs)
    : tab.checkboxListId ?? undefined

  if (checkboxListId === undefined) {
    logger.parser.debug('Tab has no task list, skipping', {
      documentId: document.documentId,
      tab: title,
    }, 'derive-no-checkbox-list')
    return []
  }

  const tasks: Task[] = []
  const occurrences = new Map<string, number>()

  for (const paragraph of tab.paragraphs) {
    if (isHeading(paragraph)) continue

    const text = paragraph.text.trim()
    const seen = occurrences.get(text) ?? 0
    occurrences.set(text, seen + 1)

    try {
      const task = parseTaskLine(paragraph, checkboxListId, {
        id: stableTaskId(document.documentId, tab.tabId, text, String(seen)),
        timeZone: options.timeZone,
        source: options.source,
      })
      if (task) {
        tasks.push(title ? withTaskFields(task, { section: title }) : task)
      }
    } catch (error) {
      if (!(error instanceof TaskParseError)) throw error
      logger.parser.debug('Skipping unparseable task line', {
        documentId: document.documentId,
        tab: title,
        error: error.toString(),
      }, 'derive-skip-line')
    }
  }

  return tasks
}

export function deriveTodoList(document: DocumentStructure, options: DeriveOptions = {}): Task[] {
  const excluded = new Set((options.excludeTabTitles ?? DEFAULT_EXCLUDED_TABS).map(title => title.trim().toLowerCase()))

  const tasks = document.tabs
    .filter(tab => !excluded.has(tab.title.trim().toLowerCase()))
    .flatMap(tab => deriveTabTasks(document, tab, options))

  logger.parser.info('Derived TODO list', {
    documentId: document.documentId,
    taskCount: tasks.length,
  }, 'derive-complete')

  return tasks
}
