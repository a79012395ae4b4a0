import type { ReportSink } from '../types/migration'
import { formatFileSize } from '../utils/format'

/** Everything collected about one migration */
export interface MigrationReportData {
  migrationStart: number | null      // Unix ms
  migrationEnd: number | null
  migrationSizeInBytes: number | null
  sourceDeviceName: string | null
  targetDeviceName: string | null
  transferMethod: string | null
  chosenMigrationOption: string | null
  migratedFiles: string[]
  errors: string[]
}

function emptyReport(): MigrationReportData {
  return {
    migrationStart: null,
    migrationEnd: null,
    migrationSizeInBytes: null,
    sourceDeviceName: null,
    targetDeviceName: null,
    transferMethod: null,
    chosenMigrationOption: null,
    migratedFiles: [],
    errors: []
  }
}

/**
 * In-memory report sink. Hosts persist the result of export() or getData().
 */
export class MigrationReport implements ReportSink {
  private data: MigrationReportData = emptyReport()
  private now: () => number

  constructor(now: () => number = Date.now) {
    this.now = now
  }

  recordStart(): void {
    this.data.migrationStart = this.now()
  }

  recordEnd(): void {
    this.data.migrationEnd = this.now()
  }

  recordTotalSize(bytes: number): void {
    this.data.migrationSizeInBytes = bytes
  }

  recordMigratedFile(path: string): void {
    this.data.migratedFiles.push(path)
  }

  recordError(message: string): void {
    this.data.errors.push(message)
  }

  setDevices(source: string | null, target: string | null): void {
    this.data.sourceDeviceName = source
    this.data.targetDeviceName = target
  }

  setTransferMethod(method: string): void {
    this.data.transferMethod = method
  }

  setChosenOption(option: string): void {
    this.data.chosenMigrationOption = option
  }

  getData(): MigrationReportData {
    return {
      ...this.data,
      migratedFiles: [...this.data.migratedFiles],
      errors: [...this.data.errors]
    }
  }

  reset(): void {
    this.data = emptyReport()
  }

  /** Plain text rendering; missing values read "N/P" */
  export(): string {
    const d = this.data
    const when = (ts: number | null) => (ts === null ? 'N/P' : new Date(ts).toISOString())
    const lines = [
      'Migration Report',
      '',
      `Start: ${when(d.migrationStart)}`,
      `End: ${when(d.migrationEnd)}`,
      `Size: ${d.migrationSizeInBytes === null ? 'N/P' : formatFileSize(d.migrationSizeInBytes)}`
    ]

    if (d.sourceDeviceName) lines.push(`Source device: ${d.sourceDeviceName}`)
    if (d.targetDeviceName) lines.push(`Target device: ${d.targetDeviceName}`)
    if (d.chosenMigrationOption) lines.push(`Migration option: ${d.chosenMigrationOption}`)
    if (d.transferMethod) lines.push(`Transfer method: ${d.transferMethod}`)

    lines.push('', `Migrated files (${d.migratedFiles.length}):`)
    lines.push(...d.migratedFiles.map((f) => `  ${f}`))
    lines.push('', `Errors (${d.errors.length}):`)
    lines.push(...d.errors.map((e) => `  ${e}`))

    return lines.join('\n')
  }
}
