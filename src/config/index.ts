export {
  CONFIG_ENV_VAR,
  WEEKDAYS,
  configSchema,
  createDefaultConfig,
  formatIssues,
  getDefaultConfigPath,
  loadConfig,
  loadConfigOrDefault,
  parseConfig,
  resolveConfigPath,
  writeConfig,
} from './settings'
export type {
  DocumentsConfig,
  SchedulingConfig,
  SlacklineConfig,
  TimeBlockConfig,
} from './settings'
export { configToTimeBlocks, getWorkWindow } from './converters'
export type { WorkWindow } from './converters'
