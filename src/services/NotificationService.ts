import type { MigrationSettings } from '../types/settings'

/** Host action run when a migration finishes (sound, raising the window) */
export type FinishedHandler = () => void | Promise<void>

/**
 * Fires the host's "migration finished" hook, gated by the
 * notification settings. Handler failures go to onError, never to the caller.
 */
export class NotificationService {
  private getSettings: () => Pick<MigrationSettings, 'notificationsEnabled' | 'notifyOnMigrationComplete'>
  private handler: FinishedHandler
  private onError: (err: unknown) => void

  constructor(
    handler: FinishedHandler,
    getSettings: () => Pick<MigrationSettings, 'notificationsEnabled' | 'notifyOnMigrationComplete'>,
    onError: (err: unknown) => void = (err) => console.error('Finished handler failed:', err)
  ) {
    this.handler = handler
    this.getSettings = getSettings
    this.onError = onError
  }

  /** Returns whether the handler was invoked */
  async migrationFinished(): Promise<boolean> {
    const settings = this.getSettings()
    if (!settings.notificationsEnabled || !settings.notifyOnMigrationComplete) return false

    try {
      await this.handler()
    } catch (err) {
      this.onError(err)
    }
    return true
  }
}
