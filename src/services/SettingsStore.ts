import Conf from 'conf'
import { DEFAULT_SETTINGS } from '../types/settings'
import type { MigrationSettings } from '../types/settings'

export interface SettingsStoreOptions {
  /** Directory holding the settings file; defaults to the OS config dir */
  cwd?: string
  configName?: string
}

/**
 * SettingsStore: persists migration preferences using conf.
 */
export class SettingsStore {
  private store: Conf<{ settings: MigrationSettings }>

  constructor(options: SettingsStoreOptions = {}) {
    this.store = new Conf<{ settings: MigrationSettings }>({
      projectName: 'migration-orchestrator',
      configName: options.configName ?? 'migration-settings',
      cwd: options.cwd,
      defaults: {
        settings: DEFAULT_SETTINGS
      }
    })
  }

  /** Get all settings (defaults fill keys added since the file was written) */
  getAll(): MigrationSettings {
    const saved: Partial<MigrationSettings> | undefined = this.store.get('settings')
    return { ...DEFAULT_SETTINGS, ...saved }
  }

  /** Get a single setting value */
  get<K extends keyof MigrationSettings>(key: K): MigrationSettings[K] {
    return this.getAll()[key]
  }

  /** Update one or more settings */
  update(updates: Partial<MigrationSettings>): MigrationSettings {
    const updated = { ...this.getAll(), ...updates }
    this.store.set('settings', updated)
    return updated
  }

  /** Reset all settings to defaults */
  reset(): MigrationSettings {
    this.store.set('settings', DEFAULT_SETTINGS)
    return { ...DEFAULT_SETTINGS }
  }
}
