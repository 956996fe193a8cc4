import type { Comparable, Comparator } from '../types/sorting'
import { naturalOrder } from './naturalOrder'

/**
 * Insertion sort over a copy of `input`.
 *
 * Grows a sorted prefix one element at a time, shifting strictly greater
 * prefix elements one slot right. Equal elements are never shifted past
 * each other, which keeps the sort stable.
 */
export function insertionSort<T extends Comparable>(input: readonly T[]): T[]
export function insertionSort<T>(input: readonly T[], compare: Comparator<T>): T[]
export function insertionSort<T>(input: readonly T[], compare: Comparator<T> = naturalOrder): T[] {
  const result = input.slice()

  for (let i = 1; i < result.length; i++) {
    const element = result[i]
    let j = i - 1

    while (j >= 0 && compare(result[j], element) > 0) {
      result[j + 1] = result[j]
      j--
    }

    result[j + 1] = element
  }

  return result
}
