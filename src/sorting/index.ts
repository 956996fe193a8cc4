/**
 * Sorting library
 *
 * Five comparison sorts sharing one contract: `input` is read-only and a new
 * array is returned, even for empty and single-element input.
 *
 * @module sorting
 */

import type { AlgorithmName, SortAlgorithm } from '../types/sorting'
import { bubbleSort } from './bubbleSort'
import { insertionSort } from './insertionSort'
import { mergeSort } from './mergeSort'
import { quickSort } from './quickSort'
import { builtinSort } from './builtinSort'

export { bubbleSort, insertionSort, mergeSort, quickSort, builtinSort }
export { naturalOrder, isSorted } from './naturalOrder'

/**
 * Algorithms in the order the harness measures and reports them
 */
export const ALGORITHMS: readonly SortAlgorithm[] = [
  { name: 'Bubble', sort: bubbleSort, quadratic: true, stable: true },
  { name: 'Insertion', sort: insertionSort, quadratic: true, stable: true },
  { name: 'Merge', sort: mergeSort, quadratic: false, stable: true },
  { name: 'Quick', sort: quickSort, quadratic: false, stable: false },
  { name: 'Timsort', sort: builtinSort, quadratic: false, stable: true }
]

/**
 * Looks up a registered algorithm by its report label
 */
export function getAlgorithm(name: AlgorithmName): SortAlgorithm {
  const algorithm = ALGORITHMS.find((entry) => entry.name === name)
  if (!algorithm) {
    throw new Error(`Unknown sorting algorithm: ${name}`)
  }
  return algorithm
}
