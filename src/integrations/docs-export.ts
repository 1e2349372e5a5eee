/**
 * Converts a Docs API document export (`documents.get` with
 * `includeTabsContent`) into the flat DocumentStructure used for task
 * derivation.
 *
 * - Text runs of a paragraph are joined into one line
 * - Runs carrying suggested insertions or deletions are dropped
 * - Strikethrough is read from the runs and from the bullet
 * - Table cells are walked in row order
 * - Documents without tabs are read from `body` as a single untitled tab
 */

import { z } from 'zod'
import { DocumentSourceError } from '@shared/errors'
import { ParagraphStyle, isParagraphStyle } from '@shared/document-types'
import type { DocumentParagraph, DocumentStructure, DocumentTab } from '@shared/document-types'
import { TASK_IDENTIFIER } from '@shared/task-parser'

// ============================================================================
// EXPORT FORMAT
// ============================================================================

interface DocsTextStyle {
  strikethrough?: boolean
}

interface DocsTextRun {
  content?: string
  textStyle?: DocsTextStyle
  suggestedInsertionIds?: string[]
  suggestedDeletionIds?: string[]
}

interface DocsParagraph {
  elements?: { textRun?: DocsTextRun }[]
  bullet?: {
    listId?: string
    nestingLevel?: number
    textStyle?: DocsTextStyle
  }
  paragraphStyle?: {
    namedStyleType?: string
  }
}

interface DocsTable {
  tableRows?: { tableCells?: { content?: DocsStructuralElement[] }[] }[]
}

export interface DocsStructuralElement {
  paragraph?: DocsParagraph
  table?: DocsTable
}

export interface DocsTab {
  tabProperties?: {
    tabId?: string
    title?: string
    index?: number
  }
  documentTab?: {
    body?: { content?: DocsStructuralElement[] }
  }
  childTabs?: DocsTab[]
}

export interface DocsDocument {
  documentId?: string
  title?: string
  tabs?: DocsTab[]
  body?: { content?: DocsStructuralElement[] }
}

const textStyleSchema = z.object({
  strikethrough: z.boolean().optional(),
})

const textRunSchema = z.object({
  content: z.string().optional(),
  textStyle: textStyleSchema.optional(),
  suggestedInsertionIds: z.array(z.string()).optional(),
  suggestedDeletionIds: z.array(z.string()).optional(),
})

const paragraphSchema = z.object({
  elements: z.array(z.object({ textRun: textRunSchema.optional() })).optional(),
  bullet: z.object({
    listId: z.string().optional(),
    nestingLevel: z.number().int().min(0).optional(),
    textStyle: textStyleSchema.optional(),
  }).optional(),
  paragraphStyle: z.object({
    namedStyleType: z.string().optional(),
  }).optional(),
})

const structuralElementSchema: z.ZodType<DocsStructuralElement> = z.lazy(() => z.object({
  paragraph: paragraphSchema.optional(),
  table: z.object({
    tableRows: z.array(z.object({
      tableCells: z.array(z.object({
        content: z.array(structuralElementSchema).optional(),
      })).optional(),
    })).optional(),
  }).optional(),
}))

const bodySchema = z.object({
  content: z.array(structuralElementSchema).optional(),
})

const tabSchema: z.ZodType<DocsTab> = z.lazy(() => z.object({
  tabProperties: z.object({
    tabId: z.string().optional(),
    title: z.string().optional(),
    index: z.number().int().min(0).optional(),
  }).optional(),
  documentTab: z.object({ body: bodySchema.optional() }).optional(),
  childTabs: z.array(tabSchema).optional(),
}))

/**
 * Schema for a Docs API document export
 */
export const docsDocumentSchema: z.ZodType<DocsDocument> = z.object({
  documentId: z.string().optional(),
  title: z.string().optional(),
  tabs: z.array(tabSchema).optional(),
  body: bodySchema.optional(),
})

/**
 * A raw export carries `body`, or tabs with `tabProperties` / `documentTab`;
 * the flat structure carries `paragraphs` on its tabs instead.
 */
export function isDocsExport(raw: unknown): boolean {
  if (typeof raw !== 'object' || raw === null) return false
  if ('body' in raw) return true
  if (!('tabs' in raw) || !Array.isArray(raw.tabs)) return false

  return raw.tabs.some((tab: unknown) =>
    typeof tab === 'object' && tab !== null && ('tabProperties' in tab || 'documentTab' in tab))
}

/**
 * @throws DocumentSourceError listing every failing field
 */
export function parseDocsExport(raw: unknown, path?: string): DocsDocument {
  const result = docsDocumentSchema.safeParse(raw)
  if (!result.success) {
    const issues = result.error.issues.map(issue => {
      const where = issue.path.join('.')
      return where ? `${where}: ${issue.message}` : issue.message
    })
    throw new DocumentSourceError(`Invalid document export${path ? ` ${path}` : ''}: ${issues.join('; ')}`, path)
  }
  return result.data
}

// ============================================================================
// CONVERSION
// ============================================================================

function isSuggestion(run: DocsTextRun): boolean {
  return run.suggestedInsertionIds !== undefined || run.suggestedDeletionIds !== undefined
}

function acceptedRuns(paragraph: DocsParagraph): DocsTextRun[] {
  return (paragraph.elements ?? []).flatMap(element =>
    element.textRun && !isSuggestion(element.textRun) ? [element.textRun] : [])
}

function joinRuns(runs: readonly DocsTextRun[]): string {
  return runs.map(run => run.content ?? '').join('').trim()
}

function convertParagraph(paragraph: DocsParagraph): DocumentParagraph | undefined {
  const runs = acceptedRuns(paragraph)
  const text = joinRuns(runs)
  if (!text) return undefined

  const namedStyle = paragraph.paragraphStyle?.namedStyleType
  const converted: DocumentParagraph = {
    text,
    style: isParagraphStyle(namedStyle) ? namedStyle : ParagraphStyle.Normal,
  }

  const { bullet } = paragraph
  if (bullet) {
    const struck = runs.some(run => run.textStyle?.strikethrough === true) ||
      bullet.textStyle?.strikethrough === true

    converted.bullet = {
      ...(bullet.listId ? { listId: bullet.listId } : {}),
      nestingLevel: bullet.nestingLevel ?? 0,
      hasStrikethrough: struck,
    }
  }

  return converted
}

function collectParagraphs(content: readonly DocsStructuralElement[], into: DocumentParagraph[]): void {
  for (const element of content) {
    if (element.paragraph) {
      const paragraph = convertParagraph(element.paragraph)
      if (paragraph) into.push(paragraph)
    } else if (element.table) {
      for (const row of element.table.tableRows ?? []) {
        for (const cell of row.tableCells ?? []) {
          collectParagraphs(cell.content ?? [], into)
        }
      }
    }
  }
}

/**
 * The task list is declared by a top-level bullet; identifier lines inside
 * tables do not count.
 */
function findCheckboxListId(content: readonly DocsStructuralElement[]): string | undefined {
  for (const element of content) {
    const paragraph = element.paragraph
    if (!paragraph?.bullet) continue
    if (joinRuns(acceptedRuns(paragraph)) === TASK_IDENTIFIER) {
      return paragraph.bullet.listId
    }
  }
  return undefined
}

function convertContent(tabId: string, title: string, index: number, content: readonly DocsStructuralElement[]): DocumentTab {
  const paragraphs: DocumentParagraph[] = []
  collectParagraphs(content, paragraphs)

  return {
    tabId,
    title,
    index,
    checkboxListId: findCheckboxListId(content) ?? null,
    paragraphs,
  }
}

function convertTabs(tabs: readonly DocsTab[], into: DocumentTab[]): void {
  for (const tab of tabs) {
    const properties = tab.tabProperties ?? {}
    into.push(convertContent(
      properties.tabId || `tab-${into.length}`,
      properties.title ?? '',
      properties.index ?? 0,
      tab.documentTab?.body?.content ?? [],
    ))
    convertTabs(tab.childTabs ?? [], into)
  }
}

export function convertDocsExport(document: DocsDocument): DocumentStructure {
  const tabs: DocumentTab[] = []

  if (document.tabs && document.tabs.length > 0) {
    convertTabs(document.tabs, tabs)
  } else {
    const content = document.body?.content ?? []
    if (content.length > 0) {
      tabs.push(convertContent('legacy', '', 0, content))
    }
  }

  return {
    title: document.title ?? '',
    documentId: document.documentId ?? '',
    tabs,
  }
}
