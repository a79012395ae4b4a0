import { EventEmitter } from 'events'
import { appendFile } from 'fs/promises'
import { v4 as uuid } from 'uuid'
import type { LogEntry, LogLevel, LogSource, LogVerbosity } from '../types/log'

const DEFAULT_MAX_ENTRIES = 5000

export interface LogServiceOptions {
  maxEntries?: number
  verbosity?: LogVerbosity
  /** Mirror stored entries to this file ('' or undefined disables it) */
  filePath?: string
}

/**
 * LogService: event-based log aggregator for migration runs.
 *
 * Stores log entries per run in memory (FIFO with configurable max).
 * Emits 'entry' events with (runId, LogEntry) so hosts can forward them to a UI.
 */
export class LogService extends EventEmitter {
  private entries: Map<string, LogEntry[]> = new Map()
  private maxEntries: number
  private verbosity: LogVerbosity
  private filePath: string
  private fileWrite: Promise<void> = Promise.resolve()

  constructor(options: LogServiceOptions = {}) {
    super()
    this.maxEntries = options.maxEntries ?? DEFAULT_MAX_ENTRIES
    this.verbosity = options.verbosity ?? 'standard'
    this.filePath = options.filePath ?? ''
  }

  /** Set the maximum number of log entries per run */
  setMaxEntries(max: number): void {
    this.maxEntries = max
  }

  /** Choose what gets stored: nothing, everything but debug, or everything */
  setVerbosity(verbosity: LogVerbosity): void {
    this.verbosity = verbosity
  }

  /** Add a log entry for a run */
  log(
    runId: string,
    level: LogLevel,
    source: LogSource,
    message: string,
    details?: string
  ): LogEntry {
    const entry: LogEntry = {
      id: uuid(),
      timestamp: Date.now(),
      level,
      source,
      message,
      details,
      runId
    }

    // Callers still get the entry back when it is filtered out
    if (this.verbosity === 'none') return entry
    if (level === 'debug' && this.verbosity !== 'debug') return entry

    let runEntries = this.entries.get(runId)
    if (!runEntries) {
      runEntries = []
      this.entries.set(runId, runEntries)
    }

    runEntries.push(entry)

    // FIFO: discard oldest entries when over max
    while (runEntries.length > this.maxEntries) {
      runEntries.shift()
    }

    if (this.filePath) this.mirror(entry)
    this.emit('entry', runId, entry)
    return entry
  }

  /** Get all log entries for a run */
  getEntries(runId: string): LogEntry[] {
    return this.entries.get(runId) ?? []
  }

  /** Clear all log entries for a run */
  clearEntries(runId: string): void {
    this.entries.delete(runId)
  }

  /** Resolves once every pending file write has settled */
  flush(): Promise<void> {
    return this.fileWrite
  }

  /** Export log entries as formatted text */
  exportLog(runId: string): string {
    return this.getEntries(runId).map(formatEntry).join('\n')
  }

  private mirror(entry: LogEntry): void {
    const path = this.filePath
    this.fileWrite = this.fileWrite
      .then(() => appendFile(path, formatEntry(entry) + '\n', 'utf8'))
      .catch((err: unknown) => {
        console.error(`Failed to write log file ${path}:`, err)
      })
  }

  // ── Static helper methods for common log messages ──

  static migrationStarting(log: LogService, runId: string, size: string): void {
    log.log(runId, 'info', 'orchestrator', `Starting migration of ${size}.`)
  }

  static peerReadyIgnored(log: LogService, runId: string): void {
    log.log(runId, 'debug', 'orchestrator', 'Peer ready signal ignored, a run is already active.')
  }

  static phaseChanged(log: LogService, runId: string, from: string, to: string): void {
    log.log(runId, 'debug', 'orchestrator', `Phase changed: ${from} → ${to}`)
  }

  static sizeAnnounceFailed(log: LogService, runId: string, reason: string): void {
    log.log(runId, 'warning', 'transfer', `Delivery of migration size failed: ${reason}`)
  }

  static flagSendFailed(log: LogService, runId: string, key: string, reason: string): void {
    log.log(runId, 'error', 'transfer', `Delivery of default value "${key}" failed: ${reason}`, 'FLAG_SEND_FAILED')
  }

  static itemSending(log: LogService, runId: string, kind: string, path: string): void {
    log.log(runId, 'info', 'transfer', `Sending ${kind}: ${path}`)
  }

  static itemSent(log: LogService, runId: string, kind: string, path: string): void {
    log.log(runId, 'success', 'transfer', `Sent ${kind}: ${path}`)
  }

  static itemFailed(log: LogService, runId: string, kind: string, path: string, reason: string): void {
    log.log(runId, 'error', 'transfer', `Failed to send ${kind}: ${path} - ${reason}`, 'ITEM_SEND_FAILED')
  }

  static listComplete(log: LogService, runId: string, list: string): void {
    log.log(runId, 'info', 'orchestrator', `Migration of ${list} complete.`)
  }

  static completionFailed(log: LogService, runId: string, reason: string): void {
    log.log(runId, 'error', 'transfer', `Delivery of migration completion failed: ${reason}`, 'FINALIZATION_FAILED')
  }

  static migrationCompleted(log: LogService, runId: string): void {
    log.log(runId, 'success', 'orchestrator', 'Migration completed.')
  }

  static migrationCancelled(log: LogService, runId: string): void {
    log.log(runId, 'info', 'orchestrator', 'Migration cancelled by user.')
  }

  static sampleSkipped(log: LogService, runId: string, reason: string): void {
    log.log(runId, 'debug', 'bandwidth', `Bandwidth sample skipped: ${reason}`, 'SAMPLE_UNAVAILABLE')
  }
}

function formatEntry(e: LogEntry): string {
  const ts = new Date(e.timestamp).toISOString()
  const level = e.level.toUpperCase().padEnd(7)
  const src = e.source.toUpperCase().padEnd(12)
  const detail = e.details ? `\n  ${e.details}` : ''
  return `[${ts}] [${level}] [${src}] ${e.message}${detail}`
}
