import { EventEmitter } from 'events'
import { v4 as uuid } from 'uuid'
import type {
  Manifest,
  MigrationPhase,
  ProgressSnapshot,
  ReportSink,
  TransferChannel,
  TransferItem,
  TransferItemKind,
  Unsubscribe
} from '../types/migration'
import { DEFAULT_SETTINGS } from '../types/settings'
import type { MigrationSettings } from '../types/settings'
import { createMigrationStore, toStateView } from '../stores/migrationStore'
import type { MigrationStateView, MigrationStore, MigrationStoreState } from '../stores/migrationStore'
import { BandwidthSampler } from './BandwidthSampler'
import type { BandwidthEstimate } from './BandwidthSampler'
import { LogService } from './LogService'
import { NotificationService } from './NotificationService'
import type { FinishedHandler } from './NotificationService'
import { ProgressTracker } from './ProgressTracker'
import { MigrationError, getErrorMessage } from '../utils/errors'
import {
  CALCULATING_LABEL,
  formatEstimatedTimeLeft,
  formatFileSize,
  formatSpeed
} from '../utils/format'
import { SKIP_REBOOT_KEY, isEligible, requiresSkipReboot, resumeOffset } from '../utils/manifest'

export interface MigrationOrchestratorOptions {
  channel: TransferChannel
  reportSink: ReportSink
  manifest: Manifest
  settings?: Partial<MigrationSettings>
  logService?: LogService
  store?: MigrationStore
  /** Host action for a finished run (sound, raising the window) */
  onFinished?: FinishedHandler
  powerConnected?: boolean
  runId?: string
}

const TERMINAL_PHASES: ReadonlySet<MigrationPhase> = new Set(['completed', 'aborted'])
const SENDING_PHASES: ReadonlySet<MigrationPhase> = new Set([
  'preparing',
  'sendingFiles',
  'sendingApps',
  'finalizing'
])

/**
 * MigrationOrchestrator: sequences one migration run over a transfer channel.
 *
 * A "peer ready" signal starts the run. Files, then applications, are sent
 * one at a time in manifest order; a failed item is logged and skipped.
 * The run completes only once the peer acknowledges the completion message.
 *
 * Events:
 *   'phase'              → (phase, previousPhase)
 *   'itemSent'           → (TransferItem)
 *   'itemFailed'         → (TransferItem, MigrationError)
 *   'finalizationFailed' → (MigrationError)
 *   'completed'          → ()
 *   'aborted'            → ()
 */
export class MigrationOrchestrator extends EventEmitter {
  readonly runId: string

  private channel: TransferChannel
  private reportSink: ReportSink
  private manifest: Manifest
  private settings: MigrationSettings
  private logService: LogService
  private store: MigrationStore
  private notifier: NotificationService | null
  private tracker: ProgressTracker
  private sampler: BandwidthSampler
  private _phase: MigrationPhase = 'notStarted'
  private abortController: AbortController | null = null
  private runPromise: Promise<void> | null = null
  private unsubscribers: Unsubscribe[] = []
  private sizeAnnouncement: Promise<void>

  constructor(options: MigrationOrchestratorOptions) {
    super()
    this.runId = options.runId ?? uuid()
    this.channel = options.channel
    this.reportSink = options.reportSink
    this.manifest = options.manifest
    this.settings = { ...DEFAULT_SETTINGS, ...options.settings }
    this.logService = options.logService ?? new LogService({
      maxEntries: this.settings.logMaxEntries,
      verbosity: this.settings.logLevel,
      filePath: this.settings.logFilePath
    })
    this.store = options.store ?? createMigrationStore()
    this.store.getState().setPowerConnected(options.powerConnected ?? true)

    this.notifier = options.onFinished
      ? new NotificationService(
          options.onFinished,
          () => this.settings,
          (err) => this.logService.log(this.runId, 'warning', 'system', `Finished handler failed: ${getErrorMessage(err)}`)
        )
      : null

    this.tracker = new ProgressTracker(this.manifest.size)
    this.tracker.on('progress', (snapshot: ProgressSnapshot) => {
      this.publish((state) => state.setProgress(snapshot.fraction, snapshot.percentage))
    })

    this.sampler = new BandwidthSampler(
      this.channel,
      () => ({
        bytes: this.tracker.remainingBytes(),
        files: this.manifest.numberOfFiles - this.tracker.filesSent
      }),
      {
        firstSampleDelayMs: this.settings.firstSampleDelayMs,
        sampleIntervalMs: this.settings.sampleIntervalMs
      }
    )
    this.sampler.on('sample', (estimate: BandwidthEstimate) => this.onSample(estimate))
    this.sampler.on('skipped', (reason: string) => LogService.sampleSkipped(this.logService, this.runId, reason))

    // Counters only move while a run is in flight
    this.unsubscribers.push(
      this.channel.onBytesSent((count) => {
        if (SENDING_PHASES.has(this._phase)) this.tracker.addBytes(count)
      }),
      this.channel.onFileSent((count) => {
        if (SENDING_PHASES.has(this._phase)) this.tracker.addFiles(count)
      })
    )

    this.sizeAnnouncement = this.announceSize()
  }

  get phase(): MigrationPhase {
    return this._phase
  }

  get bytesSent(): number {
    return this.tracker.bytesSent
  }

  get filesSent(): number {
    return this.tracker.filesSent
  }

  /** Read-only published state */
  get state(): MigrationStateView {
    return toStateView(this.store)
  }

  get log(): LogService {
    return this.logService
  }

  /** Resolves once the size announcement sent at construction has settled */
  whenSizeAnnounced(): Promise<void> {
    return this.sizeAnnouncement
  }

  /** Resolves once the send sequence has settled (completed, aborted or stuck finalizing) */
  settled(): Promise<void> {
    return this.runPromise ?? Promise.resolve()
  }

  /** External "peer ready" signal; only the first true signal starts a run */
  peerReady(ready: boolean): void {
    if (!ready) return
    if (this._phase !== 'notStarted' || this.runPromise) {
      LogService.peerReadyIgnored(this.logService, this.runId)
      return
    }

    const controller = new AbortController()
    this.abortController = controller
    this.runPromise = this.execute(controller.signal).catch((err: unknown) => {
      this.logService.log(this.runId, 'error', 'orchestrator', `Migration task failed: ${getErrorMessage(err)}`)
      this.halt()
    })
  }

  /** Forwarded verbatim to the published state */
  setPowerConnected(connected: boolean): void {
    this.publish((state) => state.setPowerConnected(connected))
  }

  /**
   * Stop dispatching items. The in-flight send is not interrupted here;
   * it receives the run's abort signal and follows the channel's contract.
   */
  cancel(): void {
    if (this.halt()) LogService.migrationCancelled(this.logService, this.runId)
  }

  /** Cancel any active run and detach from the channel */
  dispose(): void {
    this.cancel()
    for (const unsubscribe of this.unsubscribers) unsubscribe()
    this.unsubscribers = []
  }

  private async execute(signal: AbortSignal): Promise<void> {
    // Preparing
    this.setPhase('preparing')
    this.tracker.begin(resumeOffset(this.manifest))
    const activeInterface = this.channel.currentInterfaceType()
    this.publish((state) => state.setEstimate(CALCULATING_LABEL, ''))
    this.publish((state) => state.setInterface(activeInterface))
    this.publish((state) => state.setStartedAt(Date.now()))
    this.toReport((sink) => sink.recordStart())
    this.toReport((sink) => sink.recordTotalSize(this.manifest.size))
    LogService.migrationStarting(this.logService, this.runId, formatFileSize(this.manifest.size))

    if (requiresSkipReboot(this.manifest)) {
      try {
        await this.channel.sendDefaultFlag(SKIP_REBOOT_KEY, true)
      } catch (err: unknown) {
        LogService.flagSendFailed(this.logService, this.runId, SKIP_REBOOT_KEY, getErrorMessage(err))
      }
    }
    if (signal.aborted) return

    this.setPhase('sendingFiles')
    this.sampler.start()
    await this.sendList(this.manifest.files, 'file', signal)
    if (signal.aborted) return
    LogService.listComplete(this.logService, this.runId, 'files')

    this.setPhase('sendingApps')
    await this.sendList(this.manifest.applications, 'application', signal)
    if (signal.aborted) return
    LogService.listComplete(this.logService, this.runId, 'apps')

    await this.finalize(signal)
  }

  private async sendList(items: TransferItem[], kind: TransferItemKind, signal: AbortSignal): Promise<void> {
    for (const item of items) {
      if (signal.aborted) return
      if (!isEligible(item)) continue

      LogService.itemSending(this.logService, this.runId, kind, item.sourcePath)
      try {
        await this.channel.sendFile(item, signal)
      } catch (err: unknown) {
        const reason = getErrorMessage(err)
        LogService.itemFailed(this.logService, this.runId, kind, item.sourcePath, reason)
        const error = new MigrationError(
          'ITEM_SEND_FAILED',
          `Failed to send ${kind}: ${item.sourcePath} - ${reason}`,
          err
        )
        // Application failures stay in the local log only
        if (kind === 'file') this.toReport((sink) => sink.recordError(error.message))
        this.notify('itemFailed', item, error)
        continue
      }

      item.sent = true
      LogService.itemSent(this.logService, this.runId, kind, item.sourcePath)
      if (kind === 'file') this.toReport((sink) => sink.recordMigratedFile(item.sourcePath))
      this.notify('itemSent', item)
    }
  }

  private async finalize(signal: AbortSignal): Promise<void> {
    this.setPhase('finalizing')
    this.sampler.clearPendingReport()

    try {
      await this.channel.sendMigrationCompleted()
    } catch (err: unknown) {
      const reason = getErrorMessage(err)
      LogService.completionFailed(this.logService, this.runId, reason)
      this.notify('finalizationFailed', new MigrationError('FINALIZATION_FAILED', reason, err))
      return
    }
    if (signal.aborted) return

    this.tracker.complete()
    this.publish((state) => state.setEstimate(''))
    this.sampler.stop()
    this.toReport((sink) => sink.recordEnd())
    this.setPhase('completed')
    LogService.migrationCompleted(this.logService, this.runId)
    this.notify('completed')

    if (this.notifier) await this.notifier.migrationFinished()
  }

  private onSample(estimate: BandwidthEstimate): void {
    const activeInterface = this.channel.currentInterfaceType()
    this.publish((state) => state.setInterface(activeInterface))
    this.publish((state) =>
      state.setEstimate(formatEstimatedTimeLeft(estimate.secondsLeft), formatSpeed(estimate.bytesPerSecond))
    )
  }

  private async announceSize(): Promise<void> {
    try {
      await this.channel.sendMigrationSize(this.manifest.size)
    } catch (err: unknown) {
      LogService.sizeAnnounceFailed(this.logService, this.runId, getErrorMessage(err))
    }
  }

  /** Report sink calls never break the run */
  private toReport(record: (sink: ReportSink) => void): void {
    try {
      record(this.reportSink)
    } catch (err: unknown) {
      this.logService.log(this.runId, 'warning', 'report', `Report sink failed: ${getErrorMessage(err)}`)
    }
  }

  /** Move to 'aborted' and stop all work; false when already terminal */
  private halt(): boolean {
    if (TERMINAL_PHASES.has(this._phase)) return false

    this.abortController?.abort()
    this.sampler.stop()
    this.publish((state) => state.setStartedAt(null))
    this.setPhase('aborted')
    this.notify('aborted')
    return true
  }

  /** Host listeners never break the run */
  private notify(event: string, ...args: unknown[]): void {
    try {
      this.emit(event, ...args)
    } catch (err: unknown) {
      this.logService.log(this.runId, 'warning', 'orchestrator', `Listener for "${event}" failed: ${getErrorMessage(err)}`)
    }
  }

  /** Store subscribers run synchronously inside setState */
  private publish(update: (state: MigrationStoreState) => void): void {
    try {
      update(this.store.getState())
    } catch (err: unknown) {
      this.logService.log(this.runId, 'warning', 'orchestrator', `State subscriber failed: ${getErrorMessage(err)}`)
    }
  }

  private setPhase(phase: MigrationPhase): void {
    const previous = this._phase
    if (previous === phase || TERMINAL_PHASES.has(previous)) return

    this._phase = phase
    this.publish((state) => state.setPhase(phase))
    LogService.phaseChanged(this.logService, this.runId, previous, phase)
    this.notify('phase', phase, previous)
  }
}
