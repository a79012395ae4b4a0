import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtempSync, rmSync } from 'fs'
import { tmpdir } from 'os'
import { join } from 'path'
import { SettingsStore } from './SettingsStore'
import { DEFAULT_SETTINGS } from '../types/settings'

describe('SettingsStore', () => {
  let dir: string

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'migration-settings-'))
  })

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true })
  })

  it('returns defaults on first use', () => {
    const store = new SettingsStore({ cwd: dir })
    expect(store.getAll()).toEqual(DEFAULT_SETTINGS)
    expect(store.get('sampleIntervalMs')).toBe(60_000)
  })

  it('persists updates across instances', () => {
    const store = new SettingsStore({ cwd: dir })
    const updated = store.update({ logLevel: 'debug', firstSampleDelayMs: 5000 })

    expect(updated.logLevel).toBe('debug')
    const reopened = new SettingsStore({ cwd: dir })
    expect(reopened.get('logLevel')).toBe('debug')
    expect(reopened.get('firstSampleDelayMs')).toBe(5000)
    expect(reopened.get('sampleIntervalMs')).toBe(60_000)
  })

  it('resets to defaults', () => {
    const store = new SettingsStore({ cwd: dir })
    store.update({ notificationsEnabled: false })

    expect(store.reset()).toEqual(DEFAULT_SETTINGS)
    expect(store.get('notificationsEnabled')).toBe(true)
  })
})
