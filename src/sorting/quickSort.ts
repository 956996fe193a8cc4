import type { Comparable, Comparator } from '../types/sorting'
import { naturalOrder } from './naturalOrder'

/**
 * Quicksort with a three-way partition.
 *
 * The pivot is the middle element of the working copy. Full scans split the
 * copy into strictly-less, equal and strictly-greater groups; the outer two
 * are sorted recursively and the three are concatenated.
 *
 * Not stable by contract. Recursion depth is O(log n) on average and O(n)
 * when the pivot keeps producing maximally unbalanced splits.
 */
export function quickSort<T extends Comparable>(input: readonly T[]): T[]
export function quickSort<T>(input: readonly T[], compare: Comparator<T>): T[]
export function quickSort<T>(input: readonly T[], compare: Comparator<T> = naturalOrder): T[] {
  const items = input.slice()
  if (items.length <= 1) {
    return items
  }

  const pivot = items[Math.floor(items.length / 2)]
  const less: T[] = []
  const equal: T[] = []
  const greater: T[] = []

  for (const item of items) {
    const order = compare(item, pivot)
    if (order < 0) {
      less.push(item)
    } else if (order > 0) {
      greater.push(item)
    } else {
      equal.push(item)
    }
  }

  return [...quickSort(less, compare), ...equal, ...quickSort(greater, compare)]
}
