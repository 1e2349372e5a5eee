/**
 * Core types for the structured logging system
 */

export enum LogLevel {
  ERROR = 0,
  WARN = 1,
  INFO = 2,
  DEBUG = 3,
  TRACE = 4
}

export enum LogScope {
  Scheduler = 'Scheduler',
  Parser = 'Parser',
  Config = 'Config',
  Cli = 'Cli',
  System = 'System'
}

export type LogData = Record<string, unknown>

export interface LogContext {
  scope: LogScope
  tag?: string       // Optional custom tag
}

export interface LogEntry {
  timestamp: Date
  level: LogLevel
  context: LogContext
  message: string
  data?: LogData
  aggregateCount?: number  // If this log has been aggregated
}

export interface LoggerConfig {
  level: LogLevel
  enableAggregation: boolean
  aggregationWindowMs: number
}

export interface IScopedLogger {
  error(message: string, data?: LogData, tag?: string): void
  warn(message: string, data?: LogData, tag?: string): void
  info(message: string, data?: LogData, tag?: string): void
  debug(message: string, data?: LogData, tag?: string): void
  trace(message: string, data?: LogData, tag?: string): void
}

export interface ILogger extends IScopedLogger {
  // Scoped loggers
  scheduler: IScopedLogger
  parser: IScopedLogger
  config: IScopedLogger
  cli: IScopedLogger
  system: IScopedLogger
}

const LEVEL_NAMES: Record<string, LogLevel> = {
  error: LogLevel.ERROR,
  warn: LogLevel.WARN,
  info: LogLevel.INFO,
  debug: LogLevel.DEBUG,
  trace: LogLevel.TRACE,
}

/**
 * Parse a level name such as "debug" (case-insensitive).
 * Returns undefined for anything unrecognised.
 */
export function parseLogLevel(name: string | undefined): LogLevel | undefined {
  if (!name) return undefined
  return LEVEL_NAMES[name.trim().toLowerCase()]
}

export function logLevelName(level: LogLevel): string {
  return LogLevel[level]
}
