import { describe, it, expect } from 'vitest'
import { MigrationReport } from './MigrationReport'

describe('MigrationReport', () => {
  it('collects lifecycle events', () => {
    let now = Date.UTC(2024, 0, 1, 10, 0, 0)
    const report = new MigrationReport(() => now)

    report.recordStart()
    report.recordTotalSize(1536)
    report.recordMigratedFile('/Users/test/Documents')
    report.recordError('Failed to send file: /Users/test/Desktop - connection reset')
    now += 60_000
    report.recordEnd()

    expect(report.getData()).toEqual({
      migrationStart: Date.UTC(2024, 0, 1, 10, 0, 0),
      migrationEnd: Date.UTC(2024, 0, 1, 10, 1, 0),
      migrationSizeInBytes: 1536,
      sourceDeviceName: null,
      targetDeviceName: null,
      transferMethod: null,
      chosenMigrationOption: null,
      migratedFiles: ['/Users/test/Documents'],
      errors: ['Failed to send file: /Users/test/Desktop - connection reset']
    })
  })

  it('exports a text report', () => {
    const report = new MigrationReport(() => Date.UTC(2024, 0, 1, 10, 0, 0))
    report.recordStart()
    report.recordTotalSize(1536)
    report.setDevices('Test Laptop', 'Test Desktop')
    report.setChosenOption('Lite')
    report.setTransferMethod('Wi-Fi')
    report.recordMigratedFile('/Users/test/Documents')

    expect(report.export()).toBe(
      [
        'Migration Report',
        '',
        'Start: 2024-01-01T10:00:00.000Z',
        'End: N/P',
        'Size: 1.5 KB',
        'Source device: Test Laptop',
        'Target device: Test Desktop',
        'Migration option: Lite',
        'Transfer method: Wi-Fi',
        '',
        'Migrated files (1):',
        '  /Users/test/Documents',
        '',
        'Errors (0):'
      ].join('\n')
    )
  })

  it('hands out copies and resets', () => {
    const report = new MigrationReport()
    report.recordMigratedFile('/a')
    report.getData().migratedFiles.push('/b')

    expect(report.getData().migratedFiles).toEqual(['/a'])
    report.reset()
    expect(report.getData().migratedFiles).toEqual([])
  })
})
