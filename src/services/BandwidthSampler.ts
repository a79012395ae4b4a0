import { EventEmitter } from 'events'
import type {
  InterfaceType,
  PendingTransferReport,
  TransferChannel,
  TransferReport
} from '../types/migration'

export const DEFAULT_FIRST_SAMPLE_DELAY_MS = 10_000
export const DEFAULT_SAMPLE_INTERVAL_MS = 60_000

/** Throughput and time left derived from one bandwidth window */
export interface BandwidthEstimate {
  bytesPerSecond: number
  secondsLeft: number
}

/** Work still outstanding when a sample is taken */
export interface RemainingWork {
  bytes: number
  files: number
}

export type EstimateResult =
  | { ok: true; estimate: BandwidthEstimate }
  | { ok: false; reason: string }

export interface BandwidthSamplerOptions {
  firstSampleDelayMs?: number
  sampleIntervalMs?: number
}

/**
 * Estimate the time left from the report of the active path:
 * bytes left over throughput, plus one smoothed RTT per file left.
 */
export function estimateTimeLeft(
  report: TransferReport,
  activeInterface: InterfaceType | null,
  remaining: RemainingWork
): EstimateResult {
  if (activeInterface === null) return { ok: false, reason: 'no active path' }

  const path = report.pathReports.find((p) => p.interfaceType === activeInterface)
  if (!path) return { ok: false, reason: `no report for ${activeInterface}` }
  if (!(report.duration > 0) || !isFinite(report.duration)) {
    return { ok: false, reason: 'empty window' }
  }

  const bytesPerSecond = path.sentTransportByteCount / report.duration
  if (!(bytesPerSecond > 0) || !isFinite(bytesPerSecond)) {
    return { ok: false, reason: 'no throughput' }
  }

  const rtt = isFinite(path.transportSmoothedRtt) ? Math.max(0, path.transportSmoothedRtt) : 0
  const secondsLeft =
    Math.max(0, remaining.bytes) / bytesPerSecond + Math.max(0, remaining.files) * rtt

  return { ok: true, estimate: { bytesPerSecond, secondsLeft } }
}

/**
 * BandwidthSampler: turns transport reports into time-left estimates.
 *
 * One-shot timer that re-arms itself after each sample, so every sample
 * covers the window opened by the previous one and windows never overlap.
 * The first sample comes after a short delay, the rest at a longer interval.
 *
 * Events:
 *   'sample'  → (BandwidthEstimate)
 *   'skipped' → (reason)
 */
export class BandwidthSampler extends EventEmitter {
  private channel: Pick<TransferChannel, 'startDataTransferReport' | 'currentInterfaceType'>
  private remaining: () => RemainingWork
  private firstSampleDelayMs: number
  private sampleIntervalMs: number
  private timer: ReturnType<typeof setTimeout> | null = null
  private pending: PendingTransferReport | null = null
  private _running = false
  // Bumped on every start/stop so a sample that outlives its cycle is dropped
  private generation = 0

  constructor(
    channel: Pick<TransferChannel, 'startDataTransferReport' | 'currentInterfaceType'>,
    remaining: () => RemainingWork,
    options: BandwidthSamplerOptions = {}
  ) {
    super()
    this.channel = channel
    this.remaining = remaining
    this.firstSampleDelayMs = options.firstSampleDelayMs ?? DEFAULT_FIRST_SAMPLE_DELAY_MS
    this.sampleIntervalMs = options.sampleIntervalMs ?? DEFAULT_SAMPLE_INTERVAL_MS
  }

  get running(): boolean {
    return this._running
  }

  /** Whether a sample is currently scheduled */
  get scheduled(): boolean {
    return this.timer !== null
  }

  /** Open the first window and schedule the first sample */
  start(): void {
    if (this._running) return

    this._running = true
    this.generation++
    this.pending = this.channel.startDataTransferReport()
    this.schedule(this.firstSampleDelayMs)
  }

  /** Invalidate the pending timer and drop the open window */
  stop(): void {
    this._running = false
    this.generation++
    this.clearTimer()
    this.pending = null
  }

  /** Drop the open window; no new window opens until the next start() */
  clearPendingReport(): void {
    this.pending = null
  }

  private schedule(delayMs: number): void {
    this.clearTimer()
    const generation = this.generation
    this.timer = setTimeout(() => {
      this.timer = null
      this.sample(generation).catch((err: unknown) => {
        this.emit('skipped', err instanceof Error ? err.message : 'sample failed')
      })
    }, delayMs)
  }

  private async sample(generation: number): Promise<void> {
    const pending = this.pending
    if (!pending) return

    let report: TransferReport | null = null
    let failure = ''
    try {
      report = await pending.collect()
    } catch (err: unknown) {
      failure = err instanceof Error ? err.message : 'report unavailable'
    }

    // Stopped or restarted while the report was being collected
    if (!this._running || generation !== this.generation || this.pending !== pending) return

    const result: EstimateResult = report
      ? estimateTimeLeft(report, this.channel.currentInterfaceType(), this.remaining())
      : { ok: false, reason: failure }

    // Re-arm before listeners run
    this.pending = this.channel.startDataTransferReport()
    this.schedule(this.sampleIntervalMs)

    if (result.ok) {
      this.emit('sample', result.estimate)
    } else {
      this.emit('skipped', result.reason)
    }
  }

  private clearTimer(): void {
    if (this.timer) {
      clearTimeout(this.timer)
      this.timer = null
    }
  }
}
