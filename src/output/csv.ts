import type { AggregatedMeasurement } from '../types/experiment'

export const RESULTS_FILE_NAME = 'results.csv'

export const CSV_HEADER = ['algorithm', 'n', 'avg_seconds', 'stdev_seconds'] as const

/**
 * Quotes a field when it holds a delimiter, quote or line break
 */
function escapeField(field: string): string {
  if (/[",\r\n]/.test(field)) {
    return `"${field.replace(/"/g, '""')}"`
  }
  return field
}

/**
 * Renders measurements as CSV, one row per (algorithm, n), seconds with
 * 8 decimal places. Rows end in CRLF.
 */
export function formatResultsCsv(measurements: readonly AggregatedMeasurement[]): string {
  const rows = measurements.map((measurement) => [
    measurement.algorithm,
    String(measurement.n),
    measurement.avgSeconds.toFixed(8),
    measurement.stdevSeconds.toFixed(8)
  ])

  const lines: (readonly string[])[] = [CSV_HEADER, ...rows]
  return lines
    .map((row) => row.map(escapeField).join(',') + '\r\n')
    .join('')
}
