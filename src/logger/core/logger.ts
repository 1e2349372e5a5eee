/**
 * Main logger implementation with scope management and pattern-based filtering
 */

import { ILogger, LoggerConfig, LogLevel, LogScope, LogEntry, LogData } from '../types'
import { ScopedLogger } from './scoped-logger'
import { PatternExtractor } from './pattern-extractor'
import { Transport } from './transport'

export class Logger implements ILogger {
  private static instance: Logger | null = null
  private settings: LoggerConfig
  private transports: Transport[] = []
  private recentPatterns: Map<string, { count: number; lastSeen: number }> = new Map()
  private ignoredPatterns: Set<string> = new Set()

  public readonly scheduler: ScopedLogger
  public readonly parser: ScopedLogger
  public readonly config: ScopedLogger
  public readonly cli: ScopedLogger
  public readonly system: ScopedLogger

  private constructor(config: LoggerConfig) {
    this.settings = config

    this.scheduler = this.createScopedLogger(LogScope.Scheduler)
    this.parser = this.createScopedLogger(LogScope.Parser)
    this.config = this.createScopedLogger(LogScope.Config)
    this.cli = this.createScopedLogger(LogScope.Cli)
    this.system = this.createScopedLogger(LogScope.System)
  }

  static getInstance(config?: LoggerConfig): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger(config || Logger.getDefaultConfig())
    }
    return Logger.instance
  }

  static reset(): void {
    Logger.instance = null
  }

  static getDefaultConfig(): LoggerConfig {
    return {
      level: LogLevel.WARN,
      enableAggregation: true,
      aggregationWindowMs: 1000,
    }
  }

  private createScopedLogger(scope: LogScope): ScopedLogger {
    return new ScopedLogger(scope, (entry) => this.handleLog(entry))
  }

  private handleLog(entry: LogEntry): void {
    // ERROR=0 ... TRACE=4; anything numerically above the configured level is dropped
    if (entry.level > this.settings.level) {
      return
    }

    const pattern = PatternExtractor.extractPattern(entry)

    if (this.ignoredPatterns.has(pattern)) {
      return
    }

    if (this.settings.enableAggregation) {
      const now = Date.now()
      const recent = this.recentPatterns.get(pattern)
      if (recent && (now - recent.lastSeen) < this.settings.aggregationWindowMs) {
        recent.count++
        recent.lastSeen = now
        return
      }

      if (recent && recent.count > 1) {
        entry.aggregateCount = recent.count
        entry.message = `${entry.message} (×${recent.count})`
      }

      this.recentPatterns.set(pattern, { count: 1, lastSeen: now })
    }

    for (const transport of this.transports) {
      transport.write(entry)
    }
  }

  // Default logger methods (uses System scope)
  error(message: string, data?: LogData, tag?: string): void {
    this.system.error(message, data, tag)
  }

  warn(message: string, data?: LogData, tag?: string): void {
    this.system.warn(message, data, tag)
  }

  info(message: string, data?: LogData, tag?: string): void {
    this.system.info(message, data, tag)
  }

  debug(message: string, data?: LogData, tag?: string): void {
    this.system.debug(message, data, tag)
  }

  trace(message: string, data?: LogData, tag?: string): void {
    this.system.trace(message, data, tag)
  }

  // Pattern management
  ignorePattern(pattern: string): void {
    this.ignoredPatterns.add(pattern)
  }

  clearIgnoredPatterns(): void {
    this.ignoredPatterns.clear()
  }

  getIgnoredPatterns(): string[] {
    return Array.from(this.ignoredPatterns)
  }

  // Transport management
  addTransport(transport: Transport): void {
    this.transports.push(transport)
  }

  removeTransport(transport: Transport): void {
    this.transports = this.transports.filter(t => t !== transport)
  }

  getTransports(): Transport[] {
    return [...this.transports]
  }

  setLevel(level: LogLevel): void {
    this.settings.level = level
  }

  setAggregation(enabled: boolean): void {
    this.settings.enableAggregation = enabled
    this.recentPatterns.clear()
  }

  getConfig(): LoggerConfig {
    return { ...this.settings }
  }
}
