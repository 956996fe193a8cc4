/** Summary statistics over timing samples. */

export function mean(values: readonly number[]): number {
  if (values.length === 0) {
    throw new RangeError('mean requires at least one value')
  }
  return values.reduce((sum, value) => sum + value, 0) / values.length
}

/**
 * Population standard deviation: squared deviations are divided by the
 * number of values, not by one less.
 */
export function populationStdDev(values: readonly number[]): number {
  const center = mean(values)
  const variance = values.reduce((sum, value) => sum + (value - center) ** 2, 0) / values.length
  return Math.sqrt(variance)
}
