import { v4 as uuid } from 'uuid'
import type { Manifest, MigrationOptionType, TransferItem, TransferItemKind } from '../types/migration'

/** Bytes counted before anything is sent, marking the run as started */
export const START_BIAS_BYTES = 1

/** Default key the peer reads to skip its reboot prompt */
export const SKIP_REBOOT_KEY = 'skipReboot'

export type TransferItemInput = Pick<TransferItem, 'sourcePath' | 'size'> &
  Partial<Omit<TransferItem, 'sourcePath' | 'size'>>

/** Build a transfer item, unselected and unsent unless stated */
export function createTransferItem(input: TransferItemInput, kind: TransferItemKind = 'file'): TransferItem {
  return {
    id: input.id ?? uuid(),
    name: input.name ?? (input.sourcePath.split('/').filter(Boolean).pop() || input.sourcePath),
    sourcePath: input.sourcePath,
    kind: input.kind ?? kind,
    size: input.size,
    fileCount: input.fileCount ?? 1,
    selected: input.selected ?? false,
    sent: input.sent ?? false
  }
}

/** Whether the option type moves preference domains too */
export function migratesPreferences(type: MigrationOptionType): boolean {
  return type === 'complete'
}

/**
 * Build a manifest. Size and file count cover selected items only,
 * sent or not, so a resumed run keeps the denominator of the original.
 */
export function createManifest(
  type: MigrationOptionType,
  lists: { files?: TransferItem[]; applications?: TransferItem[]; preferences?: string[] } = {}
): Manifest {
  const files = lists.files ?? []
  const applications = lists.applications ?? []
  const selected = [...files, ...applications].filter((item) => item.selected)

  return {
    type,
    files,
    applications,
    preferences: lists.preferences ?? [],
    size: selected.reduce((sum, item) => sum + item.size, 0),
    numberOfFiles: selected.reduce((sum, item) => sum + item.fileCount, 0)
  }
}

/** An item goes out only if it is selected and not already delivered */
export function isEligible(item: TransferItem): boolean {
  return item.selected && !item.sent
}

/** Starting value of the byte counter: bytes already delivered plus the start bias */
export function resumeOffset(manifest: Manifest): number {
  const delivered = [...manifest.files, ...manifest.applications]
    .filter((item) => item.sent)
    .reduce((sum, item) => sum + item.size, 0)
  return START_BIAS_BYTES + delivered
}

/** The peer is told to skip its reboot when no preferences travel */
export function requiresSkipReboot(manifest: Manifest): boolean {
  return manifest.preferences.length === 0 && !migratesPreferences(manifest.type)
}
