/**
 * Main entry point for the structured logging system
 */

import { Logger } from './core/logger'
import { ConsoleTransport } from './core/transport'
import { LogLevel, parseLogLevel } from './types'

const loggerInstance = Logger.getInstance({
  level: parseLogLevel(process.env.SLACKLINE_LOG_LEVEL) ?? LogLevel.WARN,
  enableAggregation: true,
  aggregationWindowMs: 1000,
})

// Vitest sets VITEST; tests attach their own transports
if (!process.env.VITEST) {
  loggerInstance.addTransport(new ConsoleTransport())
}

export const logger = loggerInstance

export * from './types'
export { Logger } from './core/logger'
export { Transport, ConsoleTransport, MemoryTransport, formatPrefix } from './core/transport'
