#!/usr/bin/env tsx
/**
 * slackline entry point
 */

import { config as loadEnv } from 'dotenv'
import { logger, parseLogLevel } from '@/logger'
import { run } from './program'

loadEnv()

// .env is read after the logger initialised itself
const level = parseLogLevel(process.env.SLACKLINE_LOG_LEVEL)
if (level !== undefined) {
  logger.setLevel(level)
}

run(process.argv.slice(2))
  .then(code => {
    process.exitCode = code
  })
  .catch((error: unknown) => {
    console.error(error)
    process.exitCode = 1
  })
