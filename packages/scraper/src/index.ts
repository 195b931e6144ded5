import './env.js'

export * from './scraper/index.js'
export { loadSettings, getSettings, resetSettings, SettingsError, SettingsSchema, POOL_LIMITS, BACKOFF_FACTOR } from './config/settings.js'
export type { Settings } from './config/settings.js'
export { loggers } from './config/logger.js'
