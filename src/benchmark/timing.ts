import { performance } from 'node:perf_hooks'
import type { SortFunction } from '../types/sorting'

/**
 * Result of one timed sort call
 */
export interface TimedSort {
  readonly seconds: number
  readonly output: number[]
}

/**
 * Times a single sort call with the monotonic high-resolution clock.
 * Only the call itself is inside the timed region.
 */
export function timeSort(sort: SortFunction, input: readonly number[]): TimedSort {
  const start = performance.now()
  const output = sort(input)
  const elapsed = performance.now() - start

  return { seconds: elapsed / 1000, output }
}
