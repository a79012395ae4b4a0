/** Kind of entry being moved to the peer */
export type TransferItemKind = 'file' | 'application'

/** Migration option chosen on the source device */
export type MigrationOptionType = 'lite' | 'complete' | 'advanced' | 'none'

/** A single file or application slated for transfer */
export interface TransferItem {
  id: string
  name: string
  sourcePath: string
  kind: TransferItemKind
  size: number          // bytes
  fileCount: number     // files contained (1 for a plain file)
  selected: boolean
  sent: boolean
}

/** Everything one run moves, with totals fixed at creation */
export interface Manifest {
  type: MigrationOptionType
  files: TransferItem[]
  applications: TransferItem[]
  preferences: string[]
  size: number          // denominator for progress, never recomputed mid-run
  numberOfFiles: number
}

/** Lifecycle phase of a migration run */
export type MigrationPhase =
  | 'notStarted'
  | 'preparing'
  | 'sendingFiles'
  | 'sendingApps'
  | 'finalizing'
  | 'completed'
  | 'aborted'

/** Network interface a connection path runs over */
export type InterfaceType = 'wifi' | 'cellular' | 'wiredEthernet' | 'loopback' | 'other'

/** Per-path figures for one bandwidth window */
export interface PathReport {
  interfaceType: InterfaceType
  sentTransportByteCount: number
  transportSmoothedRtt: number   // seconds
}

/** Transport figures collected when a bandwidth window is closed */
export interface TransferReport {
  duration: number               // seconds
  pathReports: PathReport[]
}

/** An open bandwidth window; collecting it closes the window */
export interface PendingTransferReport {
  collect(): Promise<TransferReport>
}

export type Unsubscribe = () => void

/**
 * Device-to-device connection used to move the manifest.
 * Every send rejects on failure.
 */
export interface TransferChannel {
  sendFile(item: TransferItem, signal?: AbortSignal): Promise<void>
  sendMigrationSize(totalBytes: number): Promise<void>
  sendDefaultFlag(key: string, value: boolean): Promise<void>
  sendMigrationCompleted(): Promise<void>
  onBytesSent(listener: (count: number) => void): Unsubscribe
  onFileSent(listener: (count: number) => void): Unsubscribe
  startDataTransferReport(): PendingTransferReport
  currentInterfaceType(): InterfaceType | null
}

/** External target for migration lifecycle events */
export interface ReportSink {
  recordStart(): void
  recordTotalSize(bytes: number): void
  recordMigratedFile(path: string): void
  recordError(message: string): void
  recordEnd(): void
}

/** Progress values derived from the byte counters */
export interface ProgressSnapshot {
  fraction: number
  percentage: string
}

/** Everything observers can read about a run */
export interface MigrationState {
  phase: MigrationPhase
  fraction: number
  percentage: string
  estimatedTimeLeft: string
  transferSpeed: string
  interfaceLabel: string
  powerConnected: boolean
  startedAt: number | null
}
