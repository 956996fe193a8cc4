/**
 * Experiment Type Definitions
 *
 * Types for the timing harness: options accepted from callers, the resolved
 * configuration, per-trial samples and aggregated measurements.
 *
 * @module experiment-types
 */

import type { AlgorithmName } from './sorting'

/**
 * Stream the harness prints progress to
 */
export type ProgressStream = Pick<NodeJS.WritableStream, 'write'>

/**
 * Options accepted by `runExperiments`
 */
export interface ExperimentOptions {
  /** Input sizes to measure (default: 128..4096 in powers of two) */
  sizes?: readonly number[]
  /** Trials per (algorithm, size) pair (default: 3) */
  trials?: number
  /** Directory receiving results.csv and complexity.png (default: <package>/plots) */
  outdir?: string
  /** Seed for the input generator (default: 0) */
  seed?: number
  /** Largest size the quadratic algorithms run at (default: 1024) */
  maxQuadraticSize?: number
  /** Check every sorted trial output (default: true) */
  verify?: boolean
}

/**
 * Fully resolved experiment configuration
 */
export interface ExperimentConfig {
  readonly sizes: readonly number[]
  readonly trials: number
  readonly outdir: string
  readonly seed: number
  readonly maxQuadraticSize: number
  readonly verify: boolean
}

/**
 * Elapsed time of a single trial
 */
export interface TimingSample {
  readonly algorithm: AlgorithmName
  readonly n: number
  readonly seconds: number
}

/**
 * Mean and population standard deviation over the trials of one
 * (algorithm, n) pair
 */
export interface AggregatedMeasurement {
  readonly algorithm: AlgorithmName
  readonly n: number
  readonly avgSeconds: number
  readonly stdevSeconds: number
}

/**
 * Outcome of a complete run
 */
export interface ExperimentResult {
  readonly config: ExperimentConfig
  readonly measurements: readonly AggregatedMeasurement[]
  readonly csvPath: string
  readonly chartPath: string
}
