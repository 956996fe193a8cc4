import type { Comparable, Comparator } from '../types/sorting'

type OrderKey = number | bigint | string

function toOrderKey(value: unknown): OrderKey {
  if (typeof value === 'number' || typeof value === 'bigint' || typeof value === 'string') {
    return value
  }
  if (value instanceof Date) {
    return value.getTime()
  }
  throw new TypeError(`Value has no natural order: ${String(value)}`)
}

/**
 * Natural ascending order of {@link Comparable} values.
 *
 * Numbers and bigints compare with each other; strings compare by code
 * unit; dates by timestamp. Mixing strings with numeric values throws, as
 * the two have no common order.
 */
export function naturalOrder(a: unknown, b: unknown): number {
  const left = toOrderKey(a)
  const right = toOrderKey(b)

  if ((typeof left === 'string') !== (typeof right === 'string')) {
    throw new TypeError(`Cannot compare ${typeof a} with ${typeof b}`)
  }

  if (left < right) {
    return -1
  }
  if (left > right) {
    return 1
  }
  return 0
}

/**
 * Whether `values` is in non-decreasing order under `compare`
 */
export function isSorted<T extends Comparable>(values: readonly T[]): boolean
export function isSorted<T>(values: readonly T[], compare: Comparator<T>): boolean
export function isSorted<T>(values: readonly T[], compare: Comparator<T> = naturalOrder): boolean {
  for (let i = 1; i < values.length; i++) {
    if (compare(values[i - 1], values[i]) > 0) {
      return false
    }
  }
  return true
}
