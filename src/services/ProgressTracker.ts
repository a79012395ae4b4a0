import { EventEmitter } from 'events'
import type { ProgressSnapshot } from '../types/migration'

/** Highest fraction shown before the peer confirms completion */
export const MAX_UNCONFIRMED_FRACTION = 0.99
const MAX_UNCONFIRMED_PERCENT = 99

export type CounterUpdate =
  | { kind: 'bytes'; count: number }
  | { kind: 'files'; count: number }

/**
 * Owns the byte and file counters of a run.
 *
 * Channel notifications are funnelled through apply(), the only writer of
 * the counters. Progress is capped below 100% until complete() is called.
 * Emits: 'progress' (ProgressSnapshot) whenever the published values change.
 */
export class ProgressTracker extends EventEmitter {
  private totalSize: number
  private _bytesSent = 0
  private _filesSent = 0
  private _fraction = 0
  private _percent = 0
  private _completed = false

  constructor(totalSize: number) {
    super()
    this.totalSize = totalSize
  }

  get bytesSent(): number {
    return this._bytesSent
  }

  get filesSent(): number {
    return this._filesSent
  }

  get completed(): boolean {
    return this._completed
  }

  /** Reset the counters for a new run, starting bytes at the resume offset */
  begin(offset: number): void {
    this._bytesSent = Math.max(0, offset)
    this._filesSent = 0
    this._fraction = 0
    this._percent = 0
    this._completed = false
    this.publish()
  }

  /** Single serialization point for counter updates */
  apply(update: CounterUpdate): void {
    if (!isFinite(update.count) || update.count <= 0) return

    if (update.kind === 'files') {
      this._filesSent += update.count
      return
    }

    this._bytesSent += update.count
    this.publish()
  }

  addBytes(count: number): void {
    this.apply({ kind: 'bytes', count })
  }

  addFiles(count: number): void {
    this.apply({ kind: 'files', count })
  }

  /** Peer confirmed completion: pin progress at exactly 100% */
  complete(): void {
    if (this._completed) return
    this._completed = true
    this._fraction = 1
    this._percent = 100
    this.emit('progress', this.snapshot())
  }

  /** Bytes still to go, never negative */
  remainingBytes(): number {
    return Math.max(0, this.totalSize - this._bytesSent)
  }

  snapshot(): ProgressSnapshot {
    return {
      fraction: this._fraction,
      percentage: `${this._percent}%`
    }
  }

  private publish(): void {
    if (this._completed) return

    const fraction = this.totalSize > 0
      ? Math.min(this._bytesSent / this.totalSize, MAX_UNCONFIRMED_FRACTION)
      : MAX_UNCONFIRMED_FRACTION
    const percent = this.totalSize > 0
      ? Math.min(MAX_UNCONFIRMED_PERCENT, Math.floor((this._bytesSent * 100) / this.totalSize))
      : MAX_UNCONFIRMED_PERCENT

    // Values only move forward within a run
    this._fraction = Math.max(this._fraction, fraction)
    this._percent = Math.max(this._percent, percent)
    this.emit('progress', this.snapshot())
  }
}
