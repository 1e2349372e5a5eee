/**
 * Error taxonomy
 *
 * Structural problems (bad input instants, broken construction invariants,
 * unparseable task lines, unreadable config or documents) are thrown.
 * Deadline violations are never thrown: the placement engine reports them
 * as conflicts in its result.
 */

export enum ErrorCode {
  InvalidInput = 'INVALID_INPUT',
  DomainValidation = 'DOMAIN_VALIDATION',
  TaskParse = 'TASK_PARSE',
  Config = 'CONFIG',
  DocumentSource = 'DOCUMENT_SOURCE',
}

export class SlacklineError extends Error {
  readonly code: ErrorCode

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
    this.code = code
  }
}

/**
 * A start instant or blocked-interval boundary handed to the placement
 * engine is not a valid, timezone-aware point in time.
 */
export class InvalidInputError extends SlacklineError {
  constructor(message: string, readonly field?: string) {
    super(ErrorCode.InvalidInput, message)
  }
}

/**
 * A Task, TimeBlock or ScheduledTask failed a construction invariant.
 */
export class DomainValidationError extends SlacklineError {
  constructor(readonly entity: string, message: string) {
    super(ErrorCode.DomainValidation, `Invalid ${entity}: ${message}`)
  }
}

/**
 * Task metadata on a document line could not be parsed.
 */
export class TaskParseError extends SlacklineError {
  readonly rawText?: string
  readonly field?: string
  readonly value?: string

  constructor(
    message: string,
    details: { rawText?: string; field?: string; value?: string } = {},
  ) {
    super(ErrorCode.TaskParse, message)
    this.rawText = details.rawText
    this.field = details.field
    this.value = details.value
  }

  override toString(): string {
    const parts = [this.message]

    if (this.field) {
      parts.push(`Field: ${this.field}`)
    }

    if (this.value !== undefined) {
      parts.push(`Value: ${JSON.stringify(this.value)}`)
    }

    if (this.rawText) {
      const text = this.rawText.length <= 100 ? this.rawText : this.rawText.slice(0, 97) + '...'
      parts.push(`Raw text: ${JSON.stringify(text)}`)
    }

    return parts.join(' | ')
  }
}

export class ConfigError extends SlacklineError {
  constructor(message: string, readonly issues: string[] = [], options?: { cause?: unknown }) {
    super(ErrorCode.Config, message, options)
  }
}

export class DocumentSourceError extends SlacklineError {
  constructor(message: string, readonly path?: string, options?: { cause?: unknown }) {
    super(ErrorCode.DocumentSource, message, options)
  }
}

export function isSlacklineError(error: unknown): error is SlacklineError {
  return error instanceof SlacklineError
}

export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
