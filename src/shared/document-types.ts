/**
 * Exported document structure
 *
 * A project document is a titled set of tabs; each tab is a flat list of
 * paragraphs. Task lines are checkbox bullets belonging to the tab's
 * checkbox list, which is the list holding the TASK_IDENTIFIER line.
 */

export enum ParagraphStyle {
  Normal = 'NORMAL_TEXT',
  Title = 'TITLE',
  Subtitle = 'SUBTITLE',
  Heading1 = 'HEADING_1',
  Heading2 = 'HEADING_2',
  Heading3 = 'HEADING_3',
  Heading4 = 'HEADING_4',
  Heading5 = 'HEADING_5',
  Heading6 = 'HEADING_6',
}

const PARAGRAPH_STYLES: readonly string[] = Object.values(ParagraphStyle)

export function isParagraphStyle(value: unknown): value is ParagraphStyle {
  return typeof value === 'string' && PARAGRAPH_STYLES.includes(value)
}

export interface DocumentBullet {
  listId?: string
  nestingLevel: number
  hasStrikethrough: boolean
}

export interface DocumentParagraph {
  text: string
  style: ParagraphStyle
  bullet?: DocumentBullet
}

export interface DocumentTab {
  tabId: string
  title: string
  index: number
  /** Discovered from the paragraphs when absent; null when known to have none */
  checkboxListId?: string | null
  paragraphs: DocumentParagraph[]
}

export interface DocumentStructure {
  title: string
  documentId: string
  tabs: DocumentTab[]
}

// Only the top three heading levels open a section
export function isHeading(paragraph: DocumentParagraph): boolean {
  return paragraph.style === ParagraphStyle.Heading1 ||
    paragraph.style === ParagraphStyle.Heading2 ||
    paragraph.style === ParagraphStyle.Heading3
}
