import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { BandwidthSampler, estimateTimeLeft } from './BandwidthSampler'
import type { BandwidthEstimate, RemainingWork } from './BandwidthSampler'
import type { TransferReport } from '../types/migration'
import { FakeTransferChannel, flushPromises } from '../test/FakeTransferChannel'

const wifiReport = (bytes: number, duration: number, rtt = 0): TransferReport => ({
  duration,
  pathReports: [{ interfaceType: 'wifi', sentTransportByteCount: bytes, transportSmoothedRtt: rtt }]
})

describe('estimateTimeLeft', () => {
  it('adds one smoothed RTT per remaining file', () => {
    const result = estimateTimeLeft(wifiReport(10_000, 10, 0.05), 'wifi', { bytes: 5000, files: 4 })

    expect(result.ok).toBe(true)
    if (!result.ok) return
    expect(result.estimate.bytesPerSecond).toBe(1000)
    expect(result.estimate.secondsLeft).toBeCloseTo(5.2)
  })

  it('yields zero when nothing is left', () => {
    const result = estimateTimeLeft(wifiReport(10_000, 10, 0.05), 'wifi', { bytes: 0, files: 0 })
    expect(result).toEqual({ ok: true, estimate: { bytesPerSecond: 1000, secondsLeft: 0 } })
  })

  it('treats a negative file count as zero', () => {
    const result = estimateTimeLeft(wifiReport(2000, 1, 3), 'wifi', { bytes: 2000, files: -3 })
    expect(result).toEqual({ ok: true, estimate: { bytesPerSecond: 2000, secondsLeft: 1 } })
  })

  it('skips when no report matches the active path', () => {
    expect(estimateTimeLeft(wifiReport(1000, 1), 'wiredEthernet', { bytes: 1, files: 0 }))
      .toEqual({ ok: false, reason: 'no report for wiredEthernet' })
    expect(estimateTimeLeft(wifiReport(1000, 1), null, { bytes: 1, files: 0 }))
      .toEqual({ ok: false, reason: 'no active path' })
  })

  it('skips empty windows and zero throughput', () => {
    expect(estimateTimeLeft(wifiReport(1000, 0), 'wifi', { bytes: 1, files: 0 }))
      .toEqual({ ok: false, reason: 'empty window' })
    expect(estimateTimeLeft(wifiReport(0, 5), 'wifi', { bytes: 1, files: 0 }))
      .toEqual({ ok: false, reason: 'no throughput' })
  })
})

describe('BandwidthSampler', () => {
  let channel: FakeTransferChannel
  let remaining: RemainingWork
  let sampler: BandwidthSampler
  let samples: BandwidthEstimate[]
  let skipped: string[]

  beforeEach(() => {
    vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout'] })
    channel = new FakeTransferChannel()
    remaining = { bytes: 5000, files: 0 }
    sampler = new BandwidthSampler(channel, () => remaining, {
      firstSampleDelayMs: 10_000,
      sampleIntervalMs: 60_000
    })
    samples = []
    skipped = []
    sampler.on('sample', (e: BandwidthEstimate) => samples.push(e))
    sampler.on('skipped', (reason: string) => skipped.push(reason))
  })

  afterEach(() => {
    sampler.stop()
    vi.useRealTimers()
  })

  it('samples after the short delay, then at the longer interval', async () => {
    channel.reports.push(wifiReport(1000, 1), wifiReport(500, 1))
    sampler.start()
    expect(channel.windowsOpened).toBe(1)

    await vi.advanceTimersByTimeAsync(9_999)
    await flushPromises()
    expect(samples).toHaveLength(0)

    await vi.advanceTimersByTimeAsync(1)
    await flushPromises()
    expect(samples).toEqual([{ bytesPerSecond: 1000, secondsLeft: 5 }])
    expect(channel.windowsOpened).toBe(2)

    await vi.advanceTimersByTimeAsync(59_999)
    await flushPromises()
    expect(samples).toHaveLength(1)

    await vi.advanceTimersByTimeAsync(1)
    await flushPromises()
    expect(samples[1]).toEqual({ bytesPerSecond: 500, secondsLeft: 10 })
    expect(channel.windowsOpened).toBe(3)
  })

  it('keeps the cadence when a sample finds no matching path', async () => {
    channel.interfaceType = 'wiredEthernet'
    channel.reports.push(wifiReport(1000, 1))
    sampler.start()

    await vi.advanceTimersByTimeAsync(10_000)
    await flushPromises()

    expect(samples).toHaveLength(0)
    expect(skipped).toEqual(['no report for wiredEthernet'])
    expect(sampler.scheduled).toBe(true)
    expect(channel.windowsOpened).toBe(2)
  })

  it('keeps the cadence when collecting a report fails', async () => {
    channel.startDataTransferReport = () => ({
      collect: () => Promise.reject(new Error('report lost'))
    })
    sampler.start()

    await vi.advanceTimersByTimeAsync(10_000)
    await flushPromises()

    expect(skipped).toEqual(['report lost'])
    expect(sampler.scheduled).toBe(true)
  })

  it('reads the remaining work at sample time', async () => {
    channel.reports.push(wifiReport(1000, 1))
    sampler.start()
    remaining = { bytes: 3000, files: 0 }

    await vi.advanceTimersByTimeAsync(10_000)
    await flushPromises()

    expect(samples).toEqual([{ bytesPerSecond: 1000, secondsLeft: 3 }])
  })

  it('stop invalidates the pending timer', async () => {
    channel.reports.push(wifiReport(1000, 1))
    sampler.start()
    sampler.stop()

    await vi.advanceTimersByTimeAsync(120_000)
    await flushPromises()

    expect(samples).toHaveLength(0)
    expect(sampler.scheduled).toBe(false)
    expect(sampler.running).toBe(false)
  })

  it('start is idempotent while running', () => {
    sampler.start()
    sampler.start()
    expect(channel.windowsOpened).toBe(1)
  })

  it('stops opening windows once the pending report is cleared', async () => {
    channel.reports.push(wifiReport(1000, 1))
    sampler.start()
    sampler.clearPendingReport()

    await vi.advanceTimersByTimeAsync(10_000)
    await flushPromises()

    expect(samples).toHaveLength(0)
    expect(channel.windowsOpened).toBe(1)
    expect(sampler.scheduled).toBe(false)
  })
})
