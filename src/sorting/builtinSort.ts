import type { Comparable, Comparator } from '../types/sorting'
import { naturalOrder } from './naturalOrder'

/**
 * Sorts a copy with the engine's built-in `Array.prototype.sort`.
 *
 * The comparator is always passed: the default built-in order compares
 * string conversions. Stable since ES2019 (V8 uses TimSort).
 */
export function builtinSort<T extends Comparable>(input: readonly T[]): T[]
export function builtinSort<T>(input: readonly T[], compare: Comparator<T>): T[]
export function builtinSort<T>(input: readonly T[], compare: Comparator<T> = naturalOrder): T[] {
  return input.slice().sort(compare)
}
