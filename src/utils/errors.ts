/** Failure categories a run can hit */
export type MigrationErrorCode =
  | 'ITEM_SEND_FAILED'
  | 'FLAG_SEND_FAILED'
  | 'FINALIZATION_FAILED'
  | 'SAMPLE_UNAVAILABLE'

/** A collaborator failure converted to one of the run's failure categories */
export class MigrationError extends Error {
  readonly code: MigrationErrorCode

  constructor(code: MigrationErrorCode, message: string, cause?: unknown) {
    super(message, { cause })
    this.name = 'MigrationError'
    this.code = code
  }
}

/** Extract a message from anything a promise may reject with */
export function getErrorMessage(err: unknown): string {
  if (err instanceof Error) return err.message
  if (typeof err === 'string') return err
  return 'Unknown error'
}
