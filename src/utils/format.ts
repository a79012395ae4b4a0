/**
 * Format a file size in bytes to human-readable string.
 * @param bytes Size in bytes
 * @param decimals Number of decimal places
 */
export function formatFileSize(bytes: number, decimals: number = 1): string {
  if (bytes === 0) return '0 B'
  if (bytes < 0 || !isFinite(bytes)) return '—'

  const k = 1024
  const units = ['B', 'KB', 'MB', 'GB', 'TB', 'PB']
  const i = Math.max(0, Math.min(Math.floor(Math.log(bytes) / Math.log(k)), units.length - 1))

  return `${parseFloat((bytes / Math.pow(k, i)).toFixed(decimals))} ${units[i]}`
}

/**
 * Format bytes per second to human-readable transfer speed.
 */
export function formatSpeed(bytesPerSecond: number): string {
  if (bytesPerSecond <= 0 || !isFinite(bytesPerSecond)) return '—'
  return `${formatFileSize(bytesPerSecond)}/s`
}

/**
 * Describe the time left, e.g. "~ 3 hours and 5 minutes".
 * Anything under a minute collapses to "Less than a minute".
 */
export function formatTimeLeft(seconds: number): string {
  if (!isFinite(seconds)) return '-'

  const total = Math.round(Math.max(seconds, 0))
  const hours = Math.floor(total / 3600)
  const minutes = Math.floor((total % 3600) / 60)

  if (hours === 0 && minutes === 0) return 'Less than a minute'

  const minuteLabel = minutes === 1 ? 'minute' : 'minutes'
  if (hours === 0) return `~ ${minutes} ${minuteLabel}`

  const hourLabel = hours === 1 ? 'hour' : 'hours'
  if (minutes === 0) return `~ ${hours} ${hourLabel}`
  return `~ ${hours} ${hourLabel} and ${minutes} ${minuteLabel}`
}

/** ETA line shown while the estimate is being computed */
export const CALCULATING_LABEL = 'Calculating…'

/** Full ETA line for a number of seconds */
export function formatEstimatedTimeLeft(seconds: number): string {
  return `About ${formatTimeLeft(seconds)} left`
}
