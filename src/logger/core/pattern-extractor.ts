/**
 * Extracts patterns from log entries for duplicate detection and filtering
 */

import { LogEntry } from '../types'

export class PatternExtractor {
  /**
   * Extract a pattern key from a log entry that ignores dynamic values
   */
  static extractPattern(entry: LogEntry): string {
    const { scope, tag } = entry.context
    const baseKey = `${scope}:${tag || 'default'}`

    return `${baseKey}:${this.normalizeMessage(entry.message)}`
  }

  /**
   * Normalize a message by removing dynamic values
   */
  static normalizeMessage(message: string): string {
    let normalized = message

    // ISO timestamps, with or without offset
    normalized = normalized.replace(
      /\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2}(\.\d{3})?)?(Z|[+-]\d{2}:\d{2})?/g,
      '<timestamp>',
    )

    // Plain calendar dates and wall-clock times ("2025-01-15 11:30")
    normalized = normalized.replace(/\d{4}-\d{2}-\d{2}( \d{2}:\d{2})?/g, '<date>')

    // Generated task ids
    normalized = normalized.replace(/\btask_[A-Za-z0-9_]+\b/g, '<task-id>')

    // Durations (like 90m, 1.5h, 120ms)
    normalized = normalized.replace(/\b\d+(\.\d+)?(ms|s|m|h)\b/g, '<duration>')

    // Counts in parentheses
    normalized = normalized.replace(/\(\d+\)/g, '(<count>)')

    // Remaining bare numbers
    normalized = normalized.replace(/\b\d+\b/g, '<n>')

    return normalized
  }

  /**
   * Get a human-readable pattern description
   */
  static getPatternDescription(pattern: string): string {
    const [scope, tag, ...messageParts] = pattern.split(':')
    if (!scope || tag === undefined) return pattern

    const message = messageParts.join(':')

    let description = `[${scope}]`
    if (tag !== 'default') {
      description += ` (${tag})`
    }
    if (message && message.length < 50) {
      description += `: ${message}`
    }

    return description
  }
}
