/**
 * User configuration
 *
 * A JSON file validated with zod. Every field has a default, so an empty
 * object is a complete configuration.
 */

import { mkdir, readFile, writeFile } from 'node:fs/promises'
import { homedir } from 'node:os'
import { dirname, join } from 'node:path'
import { z } from 'zod'
import { logger } from '@/logger'
import { TimeBlockKind } from '@shared/enums'
import { isValidTimeZone, toLocalTime } from '@shared/datetime-types'
import { ConfigError, getErrorMessage } from '@shared/errors'

export const WEEKDAYS = ['monday', 'tuesday', 'wednesday', 'thursday', 'friday', 'saturday', 'sunday'] as const

export const CONFIG_ENV_VAR = 'SLACKLINE_CONFIG'

/**
 * Schema for a wall-clock time, "HH:MM" or "H:MM" (24-hour)
 */
const localTimeSchema = z
  .string()
  .regex(/^([01]?\d|2[0-3]):[0-5]\d$/, 'must be HH:MM (24-hour)')
  .transform(value => toLocalTime(value))

const weekdaySchema = z
  .string()
  .transform(value => value.trim().toLowerCase())
  .pipe(z.enum(WEEKDAYS))

/**
 * Schema for a recurring blocked window. An end time earlier than the
 * start time means the window runs past midnight.
 */
const timeBlockConfigSchema = z
  .object({
    startTime: localTimeSchema,
    endTime: localTimeSchema,
    kind: z.nativeEnum(TimeBlockKind),
    label: z.string().min(1).optional(),
    days: z.array(weekdaySchema).default([...WEEKDAYS]),
  })
  .refine(block => block.startTime !== block.endTime, {
    message: 'startTime and endTime must differ',
    path: ['endTime'],
  })

/**
 * Schema for scheduling behaviour
 */
const schedulingConfigSchema = z
  .object({
    workStartTime: localTimeSchema.default('09:00'),
    workEndTime: localTimeSchema.default('18:00'),
    timezone: z.string().refine(isValidTimeZone, 'Unknown time zone').default('UTC'),
    defaultTaskDurationMinutes: z.number().int().min(1).default(60),
    sleepWindows: z.array(timeBlockConfigSchema).default([]),
    breaks: z.array(timeBlockConfigSchema).default([]),
    meetings: z.array(timeBlockConfigSchema).default([]),
  })
  .refine(config => config.workStartTime < config.workEndTime, {
    message: 'workStartTime must be before workEndTime',
    path: ['workEndTime'],
  })

/**
 * Schema for the local documents task lists are read from
 */
const documentsConfigSchema = z.object({
  paths: z.array(z.string().min(1)).default([]),
  excludeTabTitles: z.array(z.string()).default(['todo']),
})

export const configSchema = z.object({
  scheduling: schedulingConfigSchema.default({}),
  documents: documentsConfigSchema.default({}),
})

export type TimeBlockConfig = z.infer<typeof timeBlockConfigSchema>
export type SchedulingConfig = z.infer<typeof schedulingConfigSchema>
export type DocumentsConfig = z.infer<typeof documentsConfigSchema>
export type SlacklineConfig = z.infer<typeof configSchema>

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => {
    const path = issue.path.join('.')
    return path ? `${path}: ${issue.message}` : issue.message
  })
}

/**
 * Validate raw configuration data and apply defaults.
 *
 * @throws ConfigError listing every failing field
 */
export function parseConfig(raw: unknown): SlacklineConfig {
  const result = configSchema.safeParse(raw)
  if (!result.success) {
    const issues = formatIssues(result.error)
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`, issues)
  }
  return result.data
}

export function getDefaultConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  return env[CONFIG_ENV_VAR] || join(homedir(), '.config', 'slackline', 'config.json')
}

/**
 * An explicit path wins over SLACKLINE_CONFIG, which wins over the default location.
 */
export function resolveConfigPath(explicit?: string, env: NodeJS.ProcessEnv = process.env): string {
  return explicit || getDefaultConfigPath(env)
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}

/**
 * @throws ConfigError when the file is missing, unreadable or invalid
 */
export async function loadConfig(path: string): Promise<SlacklineConfig> {
  let text: string
  try {
    text = await readFile(path, 'utf8')
  } catch (error) {
    if (isMissingFile(error)) {
      throw new ConfigError(`Configuration file not found: ${path}`, [], { cause: error })
    }
    throw new ConfigError(`Cannot read configuration file ${path}: ${getErrorMessage(error)}`, [], { cause: error })
  }

  let raw: unknown
  try {
    raw = JSON.parse(text)
  } catch (error) {
    throw new ConfigError(`Configuration file is not valid JSON: ${path}`, [], { cause: error })
  }

  const config = parseConfig(raw)
  logger.config.debug('Configuration loaded', { path }, 'config-load')
  return config
}

/**
 * Load the file when it exists; fall back to defaults otherwise.
 */
export async function loadConfigOrDefault(path: string = getDefaultConfigPath()): Promise<SlacklineConfig> {
  try {
    return await loadConfig(path)
  } catch (error) {
    if (error instanceof ConfigError && isMissingFile(error.cause)) {
      logger.config.warn('No configuration file, using defaults', { path }, 'config-default')
      return parseConfig({})
    }
    throw error
  }
}

/**
 * Defaults plus a weekday lunch break, written by `config init`.
 */
export function createDefaultConfig(): SlacklineConfig {
  return parseConfig({
    scheduling: {
      breaks: [{
        startTime: '12:00',
        endTime: '13:00',
        kind: TimeBlockKind.Break,
        label: 'Lunch',
        days: ['monday', 'tuesday', 'wednesday', 'thursday', 'friday'],
      }],
    },
  })
}

export async function writeConfig(path: string, config: SlacklineConfig): Promise<void> {
  await mkdir(dirname(path), { recursive: true })
  await writeFile(path, `${JSON.stringify(config, null, 2)}\n`, 'utf8')
  logger.config.info('Configuration written', { path }, 'config-write')
}
