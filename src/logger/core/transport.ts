/**
 * Base transport class for log output destinations
 */

import { LogEntry, LogLevel, logLevelName } from '../types'

export abstract class Transport {
  protected enabled: boolean = true

  constructor(protected name: string) {}

  abstract write(entry: LogEntry): void

  enable(): void {
    this.enabled = true
  }

  disable(): void {
    this.enabled = false
  }

  isEnabled(): boolean {
    return this.enabled
  }

  getName(): string {
    return this.name
  }

  destroy(): void {
    this.disable()
  }
}

/**
 * Format the one-line prefix shared by text transports:
 * "[HH:MM:SS.mmm] [LEVEL] [Scope] [tag] (×n)"
 */
export function formatPrefix(entry: LogEntry): string {
  const time = entry.timestamp.toISOString().split('T')[1]?.slice(0, -1) || ''
  const { scope, tag } = entry.context

  let prefix = `[${time}] [${logLevelName(entry.level)}] [${scope}]`

  if (tag) {
    prefix += ` [${tag}]`
  }

  if (entry.aggregateCount && entry.aggregateCount > 1) {
    prefix += ` (×${entry.aggregateCount})`
  }

  return prefix
}

/**
 * Console transport. Everything goes to stderr so stdout stays clean
 * for the rendered schedule.
 */
export class ConsoleTransport extends Transport {
  private lastLogTime: Map<string, number> = new Map()
  private suppressDuplicateMs: number = 50

  constructor(private stream: NodeJS.WritableStream = process.stderr) {
    super('console')
  }

  write(entry: LogEntry): void {
    if (!this.enabled) return

    const trimmedMessage = entry.message.length > 100
      ? entry.message.substring(0, 100) + '...'
      : entry.message
    const data = entry.data && Object.keys(entry.data).length > 0 ? JSON.stringify(entry.data) : ''
    const key = `${entry.context.scope}:${trimmedMessage}:${data}`
    const now = Date.now()
    const lastTime = this.lastLogTime.get(key)

    // Suppress rapid duplicates
    if (lastTime !== undefined && (now - lastTime) < this.suppressDuplicateMs) {
      return
    }

    this.lastLogTime.set(key, now)

    if (this.lastLogTime.size > 1000) {
      const cutoff = now - 10000
      for (const [k, time] of Array.from(this.lastLogTime.entries())) {
        if (time < cutoff) {
          this.lastLogTime.delete(k)
        }
      }
    }

    let line = `${formatPrefix(entry)} ${entry.message}`
    if (data) {
      line += ` ${data}`
    }

    this.stream.write(line + '\n')
  }
}

/**
 * Keeps the newest entries in memory for inspection.
 */
export class MemoryTransport extends Transport {
  private entries: LogEntry[] = []

  constructor(private maxEntries: number = 1000) {
    super('memory')
  }

  write(entry: LogEntry): void {
    if (!this.enabled) return
    this.entries.push(entry)
    if (this.entries.length > this.maxEntries) {
      this.entries.shift()
    }
  }

  getEntries(minLevel: LogLevel = LogLevel.TRACE): LogEntry[] {
    return this.entries.filter(entry => entry.level <= minLevel)
  }

  clear(): void {
    this.entries = []
  }
}
