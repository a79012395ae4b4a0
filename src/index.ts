export { MigrationOrchestrator } from './services/MigrationOrchestrator'
export type { MigrationOrchestratorOptions } from './services/MigrationOrchestrator'
export { ProgressTracker, MAX_UNCONFIRMED_FRACTION } from './services/ProgressTracker'
export type { CounterUpdate } from './services/ProgressTracker'
export {
  BandwidthSampler,
  estimateTimeLeft,
  DEFAULT_FIRST_SAMPLE_DELAY_MS,
  DEFAULT_SAMPLE_INTERVAL_MS
} from './services/BandwidthSampler'
export type { BandwidthEstimate, BandwidthSamplerOptions, EstimateResult, RemainingWork } from './services/BandwidthSampler'
export { LogService } from './services/LogService'
export type { LogServiceOptions } from './services/LogService'
export { MigrationReport } from './services/MigrationReport'
export type { MigrationReportData } from './services/MigrationReport'
export { NotificationService } from './services/NotificationService'
export type { FinishedHandler } from './services/NotificationService'
export { SettingsStore } from './services/SettingsStore'
export type { SettingsStoreOptions } from './services/SettingsStore'
export {
  createMigrationStore,
  interfaceLabel,
  toStateView,
  STARTING_PERCENTAGE_LABEL
} from './stores/migrationStore'
export type { MigrationStateView, MigrationStore, MigrationStoreState } from './stores/migrationStore'
export {
  createManifest,
  createTransferItem,
  isEligible,
  migratesPreferences,
  requiresSkipReboot,
  resumeOffset,
  SKIP_REBOOT_KEY,
  START_BIAS_BYTES
} from './utils/manifest'
export type { TransferItemInput } from './utils/manifest'
export { MigrationError, getErrorMessage } from './utils/errors'
export type { MigrationErrorCode } from './utils/errors'
export {
  CALCULATING_LABEL,
  formatEstimatedTimeLeft,
  formatFileSize,
  formatSpeed,
  formatTimeLeft
} from './utils/format'
export { DEFAULT_SETTINGS } from './types/settings'
export type { MigrationSettings } from './types/settings'
export type * from './types/migration'
export type * from './types/log'
