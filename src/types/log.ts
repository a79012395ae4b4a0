/** Severity level for a log entry */
export type LogLevel = 'info' | 'warning' | 'error' | 'success' | 'debug'

/** Subsystem that generated the log entry */
export type LogSource = 'orchestrator' | 'transfer' | 'bandwidth' | 'report' | 'system'

/** How much the log keeps: nothing, everything but debug, or everything */
export type LogVerbosity = 'none' | 'standard' | 'debug'

/** A single entry in a run's activity log */
export interface LogEntry {
  id: string
  timestamp: number              // Unix ms
  level: LogLevel
  source: LogSource
  message: string
  details?: string               // Expandable details (e.g., error code)
  runId: string
}
