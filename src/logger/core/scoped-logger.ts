/**
 * Scoped logger implementation - handles logging for a specific scope
 */

import { LogLevel, LogScope, LogEntry, LogData, IScopedLogger, LogContext } from '../types'

export class ScopedLogger implements IScopedLogger {
  constructor(
    private scope: LogScope,
    private onLog: (entry: LogEntry) => void,
  ) {}

  error(message: string, data?: LogData, tag?: string): void {
    this.log(LogLevel.ERROR, message, data, tag)
  }

  warn(message: string, data?: LogData, tag?: string): void {
    this.log(LogLevel.WARN, message, data, tag)
  }

  info(message: string, data?: LogData, tag?: string): void {
    this.log(LogLevel.INFO, message, data, tag)
  }

  debug(message: string, data?: LogData, tag?: string): void {
    this.log(LogLevel.DEBUG, message, data, tag)
  }

  trace(message: string, data?: LogData, tag?: string): void {
    this.log(LogLevel.TRACE, message, data, tag)
  }

  private log(level: LogLevel, message: string, data?: LogData, tag?: string): void {
    const context: LogContext = { scope: this.scope }
    if (tag) context.tag = tag

    const entry: LogEntry = {
      timestamp: new Date(),
      level,
      context,
      message,
      ...(data && Object.keys(data).length > 0 ? { data } : {}),
    }

    this.onLog(entry)
  }
}
