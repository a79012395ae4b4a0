import type { LogVerbosity } from './log'

/** Migration settings, persisted by SettingsStore */
export interface MigrationSettings {
  // Bandwidth sampling
  firstSampleDelayMs: number
  sampleIntervalMs: number

  // Log
  logLevel: LogVerbosity
  logMaxEntries: number
  logFilePath: string            // '' disables the file mirror

  // Notifications
  notificationsEnabled: boolean
  notifyOnMigrationComplete: boolean
}

export const DEFAULT_SETTINGS: MigrationSettings = {
  firstSampleDelayMs: 10_000,
  sampleIntervalMs: 60_000,

  logLevel: 'standard',
  logMaxEntries: 5000,
  logFilePath: '',

  notificationsEnabled: true,
  notifyOnMigrationComplete: true
}
