/**
 * Experiment Runner - Sorting Complexity Measurement
 *
 * Times every registered sorting algorithm over a sweep of input sizes,
 * aggregates the trials of each (algorithm, size) pair and writes the
 * results table and the complexity chart.
 *
 * @module ExperimentRunner
 */

import type {
  AggregatedMeasurement,
  ExperimentConfig,
  ExperimentOptions,
  ExperimentResult,
  ProgressStream,
  TimingSample
} from '../types/experiment'
import type { SortAlgorithm } from '../types/sorting'
import { ALGORITHMS, isSorted } from '../sorting'
import { resolveExperimentConfig } from '../config/experiment-config'
import { OutputWriter, type ArtifactWriter } from '../output/OutputWriter'
import { ChartRenderer } from '../output/ChartRenderer'
import { formatResultsCsv, RESULTS_FILE_NAME } from '../output/csv'
import { SortVerificationError } from '../validation/errors'
import { SeededRandom } from './SeededRandom'
import { mean, populationStdDev } from './statistics'
import { timeSort } from './timing'
import { coreLogger, errorLogger } from '../utils/logger'

/**
 * Collaborators a run writes through
 */
export interface ExperimentDependencies {
  /** Progress output (default: process.stdout) */
  readonly stdout?: ProgressStream
  /** Algorithms to measure, in report order (default: ALGORITHMS) */
  readonly algorithms?: readonly SortAlgorithm[]
  readonly writer?: ArtifactWriter
  readonly chartRenderer?: Pick<ChartRenderer, 'render'>
}

/**
 * Random integer input of length `n` with values in [0, n * 10]
 */
export function generateInput(random: SeededRandom, n: number): number[] {
  return random.integers(n, 0, n * 10)
}

/**
 * Sizes an algorithm is measured at: quadratic algorithms stop at the
 * configured cap, the rest run at every size
 */
export function sizesFor(algorithm: SortAlgorithm, config: ExperimentConfig): number[] {
  if (!algorithm.quadratic) {
    return [...config.sizes]
  }
  return config.sizes.filter((size) => size <= config.maxQuadraticSize)
}

/**
 * Mean and population standard deviation of samples sharing one
 * (algorithm, n) pair
 */
export function aggregateSamples(samples: readonly TimingSample[]): AggregatedMeasurement {
  const [first] = samples
  if (!first) {
    throw new RangeError('Cannot aggregate an empty set of timing samples')
  }

  const mismatched = samples.find(
    (sample) => sample.algorithm !== first.algorithm || sample.n !== first.n
  )
  if (mismatched) {
    throw new RangeError(
      `Cannot aggregate ${mismatched.algorithm}/n=${mismatched.n} with ${first.algorithm}/n=${first.n}`
    )
  }

  const seconds = samples.map((sample) => sample.seconds)
  return {
    algorithm: first.algorithm,
    n: first.n,
    avgSeconds: mean(seconds),
    stdevSeconds: populationStdDev(seconds)
  }
}

/**
 * Formats the per-measurement summary line printed during a run
 */
export function formatMeasurementLine(measurement: AggregatedMeasurement): string {
  const size = String(measurement.n).padStart(5)
  return `  size=${size} avg_time=${measurement.avgSeconds.toFixed(6)}s stdev=${measurement.stdevSeconds.toFixed(6)}s`
}

/**
 * Experiment runner implementation
 */
export class ExperimentRunner {
  private config: ExperimentConfig
  private stdout: ProgressStream
  private algorithms: readonly SortAlgorithm[]
  private writer: ArtifactWriter
  private chartRenderer: Pick<ChartRenderer, 'render'>
  private debug = coreLogger()
  private debugError = errorLogger()

  constructor(options: ExperimentOptions = {}, dependencies: ExperimentDependencies = {}) {
    this.config = resolveExperimentConfig(options)
    this.stdout = dependencies.stdout ?? process.stdout
    this.algorithms = dependencies.algorithms ?? ALGORITHMS
    const writer = dependencies.writer ?? new OutputWriter()
    this.writer = writer
    this.chartRenderer = dependencies.chartRenderer ?? new ChartRenderer({}, writer)
  }

  getConfig(): ExperimentConfig {
    return this.config
  }

  /**
   * Runs the measurement sweep.
   *
   * The generator is seeded once here, so for a fixed configuration every
   * call draws the same sequence of input arrays.
   */
  measure(): AggregatedMeasurement[] {
    const random = new SeededRandom(this.config.seed)
    const measurements: AggregatedMeasurement[] = []

    for (const algorithm of this.algorithms) {
      this.print(`Running ${algorithm.name}...`)

      for (const n of sizesFor(algorithm, this.config)) {
        const samples: TimingSample[] = []

        for (let trial = 0; trial < this.config.trials; trial++) {
          const input = generateInput(random, n)
          const { seconds, output } = timeSort(algorithm.sort, input)

          if (this.config.verify && (output.length !== n || !isSorted(output))) {
            this.debugError('%s returned unsorted output for n=%d', algorithm.name, n)
            throw new SortVerificationError(algorithm.name, n)
          }

          samples.push({ algorithm: algorithm.name, n, seconds })
        }

        const measurement = aggregateSamples(samples)
        measurements.push(measurement)
        this.print(formatMeasurementLine(measurement))
      }
    }

    this.debug('Measurement completed, %d rows', measurements.length)
    return measurements
  }

  /**
   * Measures, then writes results.csv and complexity.png to the output
   * directory. Write failures propagate as ArtifactWriteError.
   */
  async run(): Promise<ExperimentResult> {
    const measurements = this.measure()

    const csvPath = this.writer.write(
      this.config.outdir,
      RESULTS_FILE_NAME,
      formatResultsCsv(measurements)
    )
    this.print(`Results saved to ${csvPath}`)

    const chartPath = await this.chartRenderer.render(measurements, this.config.outdir)
    this.print(`Plot saved to ${chartPath}`)

    return { config: this.config, measurements, csvPath, chartPath }
  }

  private print(line: string): void {
    this.stdout.write(`${line}\n`)
  }
}

/**
 * Runs a full experiment with the given options
 */
export function runExperiments(
  options: ExperimentOptions = {},
  dependencies: ExperimentDependencies = {}
): Promise<ExperimentResult> {
  return new ExperimentRunner(options, dependencies).run()
}

/**
 * Measures without writing artifacts
 */
export function measureAlgorithms(
  options: ExperimentOptions = {},
  dependencies: ExperimentDependencies = {}
): AggregatedMeasurement[] {
  return new ExperimentRunner(options, dependencies).measure()
}
