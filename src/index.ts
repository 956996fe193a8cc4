/**
 * sort-bench
 *
 * Reference comparison sorts and an empirical harness that measures and
 * charts their running time against input size.
 */

// Export sorting library
export {
  bubbleSort,
  insertionSort,
  mergeSort,
  quickSort,
  builtinSort,
  naturalOrder,
  isSorted,
  ALGORITHMS,
  getAlgorithm
} from './sorting/index.js'
export type {
  AlgorithmName,
  Comparable,
  Comparator,
  SortAlgorithm,
  SortFunction
} from './types/sorting.js'

// Export harness
export {
  ExperimentRunner,
  runExperiments,
  measureAlgorithms,
  aggregateSamples,
  generateInput,
  sizesFor,
  formatMeasurementLine,
  type ExperimentDependencies
} from './benchmark/ExperimentRunner.js'
export { SeededRandom } from './benchmark/SeededRandom.js'
export { mean, populationStdDev } from './benchmark/statistics.js'
export { timeSort, type TimedSort } from './benchmark/timing.js'
export type {
  AggregatedMeasurement,
  ExperimentConfig,
  ExperimentOptions,
  ExperimentResult,
  ProgressStream,
  TimingSample
} from './types/experiment.js'

// Export configuration
export {
  DEFAULT_EXPERIMENT_CONFIG,
  resolveExperimentConfig,
  sizesFromPowers
} from './config/experiment-config.js'

// Export artifact writers
export {
  OutputWriter,
  type OutputWriterConfig,
  type ArtifactWriter
} from './output/OutputWriter.js'
export { formatResultsCsv, RESULTS_FILE_NAME } from './output/csv.js'
export {
  ChartRenderer,
  buildChartSpec,
  renderChartSvg,
  CHART_FILE_NAME,
  type ChartRendererConfig
} from './output/ChartRenderer.js'

// Export errors
export {
  SortBenchError,
  ConfigValidationError,
  UsageError,
  ArtifactWriteError,
  SortVerificationError
} from './validation/errors.js'
