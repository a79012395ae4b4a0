import { describe, it, expect } from 'vitest'
import { formatEstimatedTimeLeft, formatFileSize, formatSpeed, formatTimeLeft } from './format'

describe('formatTimeLeft', () => {
  it('collapses anything under a minute', () => {
    expect(formatTimeLeft(0)).toBe('Less than a minute')
    expect(formatTimeLeft(59)).toBe('Less than a minute')
    expect(formatTimeLeft(-10)).toBe('Less than a minute')
  })

  it('formats minutes and hours', () => {
    expect(formatTimeLeft(60)).toBe('~ 1 minute')
    expect(formatTimeLeft(125)).toBe('~ 2 minutes')
    expect(formatTimeLeft(3600)).toBe('~ 1 hour')
    expect(formatTimeLeft(3660)).toBe('~ 1 hour and 1 minute')
    expect(formatTimeLeft(7500)).toBe('~ 2 hours and 5 minutes')
  })

  it('returns a dash for non-finite values', () => {
    expect(formatTimeLeft(Infinity)).toBe('-')
    expect(formatTimeLeft(Number.NaN)).toBe('-')
  })

  it('wraps the estimate in a sentence', () => {
    expect(formatEstimatedTimeLeft(125)).toBe('About ~ 2 minutes left')
  })
})

describe('formatFileSize', () => {
  it('picks a unit', () => {
    expect(formatFileSize(0)).toBe('0 B')
    expect(formatFileSize(512)).toBe('512 B')
    expect(formatFileSize(1536)).toBe('1.5 KB')
    expect(formatFileSize(5 * 1024 * 1024)).toBe('5 MB')
    expect(formatFileSize(-1)).toBe('—')
  })

  it('formats speeds', () => {
    expect(formatSpeed(0)).toBe('—')
    expect(formatSpeed(2048)).toBe('2 KB/s')
  })
})
