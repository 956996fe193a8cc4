/**
 * Sorting Type Definitions
 *
 * @module sorting-types
 */

/**
 * Values with a built-in total order
 */
export type Comparable = number | bigint | string | Date

/**
 * Three-way comparison: negative when `a` sorts first, positive when `b`
 * sorts first, zero when they are equal
 */
export type Comparator<T> = (a: T, b: T) => number

/**
 * Shape shared by every sort in the library.
 *
 * Without a comparator the elements must be {@link Comparable}; any other
 * element type is sorted through an explicit comparator.
 */
export interface SortFunction {
  <T extends Comparable>(input: readonly T[]): T[]
  <T>(input: readonly T[], compare: Comparator<T>): T[]
}

/**
 * Labels the harness reports algorithms under
 */
export type AlgorithmName = 'Bubble' | 'Insertion' | 'Merge' | 'Quick' | 'Timsort'

/**
 * Registry entry for one algorithm
 */
export interface SortAlgorithm {
  readonly name: AlgorithmName
  readonly sort: SortFunction
  /** Quadratic algorithms are only measured up to the configured size cap */
  readonly quadratic: boolean
  readonly stable: boolean
}
