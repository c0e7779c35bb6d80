/**
 * Distribution statistics for a set of numeric values
 */
export interface DistributionStats {
  min: number
  max: number
  avg: number
  p95: number
}

/**
 * Compute distribution statistics for a set of numeric values.
 * The average is rounded to two decimals.
 */
export function computeDistributionStats(values: number[]): DistributionStats {
  if (values.length === 0) {
    return { min: 0, max: 0, avg: 0, p95: 0 }
  }
  const sorted = [...values].sort((a, b) => a - b)
  const sum = values.reduce((a, b) => a + b, 0)
  const p95Idx = Math.ceil(0.95 * sorted.length) - 1
  return {
    min: sorted[0],
    max: sorted[sorted.length - 1],
    avg: Math.round((sum / values.length) * 100) / 100,
    p95: sorted[Math.max(0, p95Idx)],
  }
}
