/**
 * `config` subcommands
 */

import { access } from 'node:fs/promises'
import { createDefaultConfig, loadConfig, writeConfig } from '@/config'
import type { SlacklineConfig, TimeBlockConfig } from '@/config'
import { ConfigError } from '@shared/errors'
import { formatSuccess } from './formatting'

type Print = (line: string) => void

async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path)
    return true
  } catch {
    return false
  }
}

function describeDays(days: readonly string[]): string {
  return days.slice(0, 3).join(', ') + (days.length > 3 ? '...' : '')
}

function describeWindow(block: TimeBlockConfig): string {
  const label = block.label ? ` - ${block.label}` : ''
  return `   ${block.startTime} - ${block.endTime} (${describeDays(block.days)})${label}`
}

function printWindows(print: Print, heading: string, blocks: readonly TimeBlockConfig[]): void {
  if (blocks.length === 0) return
  print(heading)
  blocks.forEach(block => print(describeWindow(block)))
  print('')
}

/**
 * @throws ConfigError when the file exists and `force` is not set
 */
export async function configInitCommand(path: string, force: boolean, print: Print): Promise<void> {
  if (!force && await fileExists(path)) {
    throw new ConfigError(`Configuration file already exists: ${path}. Use --force to overwrite`)
  }

  const config = createDefaultConfig()
  await writeConfig(path, config)

  const { scheduling } = config
  print(formatSuccess(`Configuration initialized at: ${path}`))
  print('')
  print('Default settings:')
  print(`  Work hours: ${scheduling.workStartTime} - ${scheduling.workEndTime}`)
  print(`  Timezone: ${scheduling.timezone}`)
  print(`  Default task duration: ${scheduling.defaultTaskDurationMinutes} minutes`)
  print('')
  print('Edit the file to customize your schedule, breaks, and meetings.')
}

export async function configShowCommand(path: string, print: Print): Promise<void> {
  const config: SlacklineConfig = await loadConfig(path)
  const { scheduling, documents } = config

  print(`Configuration: ${path}`)
  print('')
  print('📅 Scheduling:')
  print(`   Work hours: ${scheduling.workStartTime} - ${scheduling.workEndTime}`)
  print(`   Timezone: ${scheduling.timezone}`)
  print(`   Default task duration: ${scheduling.defaultTaskDurationMinutes} minutes`)
  print('')

  printWindows(print, '😴 Sleep windows:', scheduling.sleepWindows)
  printWindows(print, '☕ Breaks:', scheduling.breaks)
  printWindows(print, '📞 Recurring meetings:', scheduling.meetings)

  print('📄 Documents:')
  if (documents.paths.length === 0) {
    print('   None configured')
  } else {
    print(`   ${documents.paths.length} configured`)
    documents.paths.slice(0, 3).forEach(documentPath => print(`     • ${documentPath}`))
    if (documents.paths.length > 3) {
      print(`     ... and ${documents.paths.length - 3} more`)
    }
  }
  print(`   Excluded tabs: ${documents.excludeTabTitles.join(', ') || 'none'}`)
}

export async function configValidateCommand(path: string, print: Print): Promise<void> {
  print(`Validating: ${path}`)
  const { scheduling, documents } = await loadConfig(path)

  print(formatSuccess('Configuration is valid'))
  print('')
  print('Summary:')
  print(`  • Work hours: ${scheduling.workStartTime} - ${scheduling.workEndTime}`)
  print(`  • Sleep windows: ${scheduling.sleepWindows.length}`)
  print(`  • Breaks: ${scheduling.breaks.length}`)
  print(`  • Meetings: ${scheduling.meetings.length}`)
  print(`  • Documents: ${documents.paths.length}`)
}

export function configPathCommand(path: string, print: Print): void {
  print(path)
}
