import type { Comparable, Comparator } from '../types/sorting'
import { naturalOrder } from './naturalOrder'

function merge<T>(left: readonly T[], right: readonly T[], compare: Comparator<T>): T[] {
  const merged: T[] = []
  let i = 0
  let j = 0

  while (i < left.length && j < right.length) {
    // ties go to the left run
    if (compare(left[i], right[j]) <= 0) {
      merged.push(left[i++])
    } else {
      merged.push(right[j++])
    }
  }

  while (i < left.length) {
    merged.push(left[i++])
  }
  while (j < right.length) {
    merged.push(right[j++])
  }

  return merged
}

/**
 * Top-down merge sort.
 *
 * Splits at `floor(length / 2)`, sorts both halves recursively and merges
 * them, so every level allocates new arrays and `input` is never written.
 * Stable.
 */
export function mergeSort<T extends Comparable>(input: readonly T[]): T[]
export function mergeSort<T>(input: readonly T[], compare: Comparator<T>): T[]
export function mergeSort<T>(input: readonly T[], compare: Comparator<T> = naturalOrder): T[] {
  if (input.length <= 1) {
    return input.slice()
  }

  const mid = Math.floor(input.length / 2)
  const left = mergeSort(input.slice(0, mid), compare)
  const right = mergeSort(input.slice(mid), compare)

  return merge(left, right, compare)
}
