/**
 * Command-line surface
 *
 * slackline [--config <path>] [--verbose] <command>
 */

import { dirname } from 'node:path'
import { Command, CommanderError } from 'commander'
import { LogLevel, logger } from '@/logger'
import { loadConfigOrDefault, resolveConfigPath } from '@/config'
import { LocalDocumentSource } from '@/integrations/local-document-source'
import { getErrorMessage, isSlacklineError } from '@shared/errors'
import {
  CommandContext,
  explainCommand,
  scheduleCommand,
  syncCommand,
  todayCommand,
} from './commands'
import {
  configInitCommand,
  configPathCommand,
  configShowCommand,
  configValidateCommand,
} from './config-commands'
import { formatError } from './formatting'

export const VERSION = '0.1.0'

export interface ProgramIO {
  print: (line: string) => void
  printError: (line: string) => void
  now: () => Date
  env: NodeJS.ProcessEnv
}

interface GlobalOptions {
  config?: string
  verbose?: boolean
}

export function createDefaultIO(): ProgramIO {
  return {
    print: line => console.log(line),
    printError: line => console.error(line),
    now: () => new Date(),
    env: process.env,
  }
}

export function createProgram(io: ProgramIO = createDefaultIO()): Command {
  const program = new Command()
    .name('slackline')
    .description('Deadline-aware scheduling of personal task lists')
    .version(VERSION)
    .option('-c, --config <path>', 'configuration file (default: $SLACKLINE_CONFIG or ~/.config/slackline/config.json)')
    .option('-v, --verbose', 'write debug logs to stderr')
    .exitOverride()
    .configureOutput({
      writeOut: text => io.print(text.trimEnd()),
      writeErr: text => io.printError(text.trimEnd()),
    })

  program.hook('preAction', () => {
    if (program.opts<GlobalOptions>().verbose) {
      // Every placement decision gets its own line
      logger.setLevel(LogLevel.DEBUG)
      logger.setAggregation(false)
    }
  })

  const configPath = (): string => resolveConfigPath(program.opts<GlobalOptions>().config, io.env)

  const commandContext = async (): Promise<CommandContext> => {
    const path = configPath()
    const config = await loadConfigOrDefault(path)
    return {
      config,
      configPath: path,
      source: new LocalDocumentSource({
        paths: config.documents.paths,
        baseDir: dirname(path),
        excludeTabTitles: config.documents.excludeTabTitles,
        timeZone: config.scheduling.timezone,
      }),
      now: io.now,
      print: io.print,
    }
  }

  program
    .command('sync')
    .description('Load every configured document and summarise its tasks')
    .action(async () => {
      await syncCommand(await commandContext())
    })

  program
    .command('today')
    .description("Show today's schedule")
    .action(async () => {
      await todayCommand(await commandContext())
    })

  program
    .command('schedule')
    .argument('[days]', 'number of days to plan (default: 3)')
    .description('Show a continuous multi-day schedule')
    .action(async (days: string | undefined) => {
      await scheduleCommand(await commandContext(), days)
    })

  program
    .command('explain')
    .argument('<taskId>', 'id shown next to a scheduled task')
    .description('Show details and the queue position of a task')
    .action(async (taskId: string) => {
      await explainCommand(await commandContext(), taskId)
    })

  const config = program
    .command('config')
    .description('Manage the configuration file')

  config
    .command('init')
    .description('Write a default configuration file')
    .option('-f, --force', 'overwrite an existing file')
    .action(async (options: { force?: boolean }) => {
      await configInitCommand(configPath(), options.force ?? false, io.print)
    })

  config
    .command('show')
    .description('Print the current configuration')
    .action(async () => {
      await configShowCommand(configPath(), io.print)
    })

  config
    .command('validate')
    .description('Check the configuration file against the schema')
    .action(async () => {
      await configValidateCommand(configPath(), io.print)
    })

  config
    .command('path')
    .description('Print the configuration file path')
    .action(() => {
      configPathCommand(configPath(), io.print)
    })

  return program
}

/**
 * Parse and execute one command line (without the node and script
 * arguments). Resolves to the process exit code.
 */
export async function run(argv: readonly string[], io: ProgramIO = createDefaultIO()): Promise<number> {
  const program = createProgram(io)

  try {
    await program.parseAsync([...argv], { from: 'user' })
    return 0
  } catch (error) {
    if (error instanceof CommanderError) {
      // Usage problems are already reported by commander itself
      return error.exitCode
    }

    if (isSlacklineError(error)) {
      io.printError(formatError(error.message))
      return 1
    }

    logger.cli.error('Unexpected failure', {
      error: getErrorMessage(error),
      stack: error instanceof Error ? error.stack : undefined,
    }, 'cli-unexpected')
    io.printError(formatError(getErrorMessage(error)))
    return 1
  }
}
