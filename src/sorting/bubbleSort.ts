import type { Comparable, Comparator } from '../types/sorting'
import { naturalOrder } from './naturalOrder'

/**
 * Bubble sort over a copy of `input`.
 *
 * Each pass swaps out-of-order neighbours, which carries the largest
 * remaining element to the end of the unsorted region. A pass without swaps
 * means the copy is sorted, so an already sorted input costs a single pass.
 * Stable: only strictly greater neighbours are swapped.
 */
export function bubbleSort<T extends Comparable>(input: readonly T[]): T[]
export function bubbleSort<T>(input: readonly T[], compare: Comparator<T>): T[]
export function bubbleSort<T>(input: readonly T[], compare: Comparator<T> = naturalOrder): T[] {
  const result = input.slice()
  const length = result.length

  for (let pass = 0; pass < length; pass++) {
    let swapped = false

    for (let j = 0; j < length - 1 - pass; j++) {
      if (compare(result[j], result[j + 1]) > 0) {
        const larger = result[j]
        result[j] = result[j + 1]
        result[j + 1] = larger
        swapped = true
      }
    }

    if (!swapped) {
      break
    }
  }

  return result
}
