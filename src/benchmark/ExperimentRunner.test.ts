/**
 * Tests for ExperimentRunner
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import * as fs from 'node:fs'
import * as os from 'node:os'
import * as path from 'node:path'
import {
  ExperimentRunner,
  aggregateSamples,
  formatMeasurementLine,
  generateInput,
  measureAlgorithms,
  runExperiments,
  sizesFor
} from './ExperimentRunner.js'
import { SeededRandom } from './SeededRandom.js'
import { ALGORITHMS, getAlgorithm } from '../sorting/index.js'
import { resolveExperimentConfig } from '../config/experiment-config.js'
import {
  ArtifactWriteError,
  ConfigValidationError,
  SortVerificationError
} from '../validation/errors.js'
import type { SortAlgorithm, SortFunction } from '../types/sorting.js'
import type { ProgressStream } from '../types/experiment.js'

// Mock the logger utilities
vi.mock('../utils/logger.js', () => ({
  coreLogger: vi.fn(() => vi.fn()),
  configLogger: vi.fn(() => vi.fn()),
  outputLogger: vi.fn(() => vi.fn()),
  errorLogger: vi.fn(() => vi.fn())
}))

const createStdout = (): ProgressStream & { lines: () => string[] } => {
  let buffer = ''
  return {
    write: (chunk: string | Uint8Array) => {
      buffer += String(chunk)
      return true
    },
    lines: () => buffer.split('\n').filter((line) => line.length > 0)
  }
}

const createChartRenderer = () => ({
  render: vi.fn(async (_measurements: unknown, outdir: string) =>
    path.join(path.resolve(outdir), 'complexity.png')
  )
})

const MEASUREMENT_LINE = /^ {2}size= *\d+ avg_time=\d+\.\d{6}s stdev=\d+\.\d{6}s$/

describe('generateInput', () => {
  it('should draw n integers in [0, n * 10] from the generator', () => {
    expect(generateInput(new SeededRandom(0), 4)).toEqual([10, 0, 9, 5])
  })

  it('should continue the generator sequence on the next call', () => {
    const random = new SeededRandom(0)
    generateInput(random, 4)
    expect(generateInput(random, 4)).toEqual([19, 22, 25, 26])
  })

  it('should stay within range for larger inputs', () => {
    const values = generateInput(new SeededRandom(5), 512)
    expect(values).toHaveLength(512)
    expect(Math.min(...values)).toBeGreaterThanOrEqual(0)
    expect(Math.max(...values)).toBeLessThanOrEqual(5120)
  })
})

describe('sizesFor', () => {
  const config = resolveExperimentConfig({ sizes: [128, 1024, 2048, 4096], outdir: 'unused' })

  it('should cap quadratic algorithms at 1024 by default', () => {
    expect(sizesFor(getAlgorithm('Bubble'), config)).toEqual([128, 1024])
    expect(sizesFor(getAlgorithm('Insertion'), config)).toEqual([128, 1024])
  })

  it('should run the other algorithms at every size', () => {
    expect(sizesFor(getAlgorithm('Merge'), config)).toEqual([128, 1024, 2048, 4096])
    expect(sizesFor(getAlgorithm('Quick'), config)).toEqual([128, 1024, 2048, 4096])
    expect(sizesFor(getAlgorithm('Timsort'), config)).toEqual([128, 1024, 2048, 4096])
  })

  it('should honour a custom cap', () => {
    const capped = resolveExperimentConfig({ sizes: [4, 8, 16], maxQuadraticSize: 8, outdir: 'unused' })
    expect(sizesFor(getAlgorithm('Bubble'), capped)).toEqual([4, 8])
  })
})

describe('aggregateSamples', () => {
  it('should compute mean and population standard deviation', () => {
    const measurement = aggregateSamples([
      { algorithm: 'Merge', n: 64, seconds: 1 },
      { algorithm: 'Merge', n: 64, seconds: 3 }
    ])

    expect(measurement).toEqual({ algorithm: 'Merge', n: 64, avgSeconds: 2, stdevSeconds: 1 })
  })

  it('should report zero deviation for a single trial', () => {
    expect(aggregateSamples([{ algorithm: 'Quick', n: 8, seconds: 0.25 }])).toEqual({
      algorithm: 'Quick',
      n: 8,
      avgSeconds: 0.25,
      stdevSeconds: 0
    })
  })

  it('should reject an empty sample set', () => {
    expect(() => aggregateSamples([])).toThrow(RangeError)
  })

  it('should reject samples from different pairs', () => {
    expect(() =>
      aggregateSamples([
        { algorithm: 'Merge', n: 64, seconds: 1 },
        { algorithm: 'Merge', n: 128, seconds: 1 }
      ])
    ).toThrow('Cannot aggregate Merge/n=128 with Merge/n=64')
  })
})

describe('formatMeasurementLine', () => {
  it('should pad the size and print six decimals', () => {
    expect(
      formatMeasurementLine({ algorithm: 'Merge', n: 128, avgSeconds: 0.0001234, stdevSeconds: 0.00001 })
    ).toBe('  size=  128 avg_time=0.000123s stdev=0.000010s')
  })
})

describe('ExperimentRunner', () => {
  describe('constructor', () => {
    it('should resolve defaults', () => {
      const runner = new ExperimentRunner()
      const config = runner.getConfig()

      expect(config.sizes).toEqual([128, 256, 512, 1024, 2048, 4096])
      expect(config.trials).toBe(3)
      expect(config.seed).toBe(0)
      expect(config.maxQuadraticSize).toBe(1024)
      expect(path.basename(config.outdir)).toBe('plots')
    })

    it('should reject invalid options', () => {
      expect(() => new ExperimentRunner({ trials: 0 })).toThrow(ConfigValidationError)
    })
  })

  describe('measure', () => {
    it('should emit one measurement per algorithm and allowed size', () => {
      const stdout = createStdout()
      const measurements = measureAlgorithms(
        { sizes: [4, 8, 16], trials: 2, maxQuadraticSize: 8 },
        { stdout }
      )

      expect(measurements.map((m) => `${m.algorithm}:${m.n}`)).toEqual([
        'Bubble:4',
        'Bubble:8',
        'Insertion:4',
        'Insertion:8',
        'Merge:4',
        'Merge:8',
        'Merge:16',
        'Quick:4',
        'Quick:8',
        'Quick:16',
        'Timsort:4',
        'Timsort:8',
        'Timsort:16'
      ])
      for (const measurement of measurements) {
        expect(measurement.avgSeconds).toBeGreaterThanOrEqual(0)
        expect(measurement.stdevSeconds).toBeGreaterThanOrEqual(0)
      }
    })

    it('should print a header per algorithm and a line per measurement', () => {
      const stdout = createStdout()
      measureAlgorithms({ sizes: [4, 8], trials: 1 }, { stdout })

      const lines = stdout.lines()
      expect(lines).toHaveLength(ALGORITHMS.length * 3)
      expect(lines.filter((line) => line.startsWith('Running '))).toEqual([
        'Running Bubble...',
        'Running Insertion...',
        'Running Merge...',
        'Running Quick...',
        'Running Timsort...'
      ])
      expect(lines[1]).toMatch(MEASUREMENT_LINE)
      expect(lines[1].startsWith('  size=    4 ')).toBe(true)
      expect(lines[2].startsWith('  size=    8 ')).toBe(true)
    })

    it('should give every trial a fresh array from the seeded generator', () => {
      const seen: unknown[][] = []
      const recording: SortFunction = <T>(input: readonly T[]): T[] => {
        seen.push([...input])
        return input.slice()
      }
      const algorithms: SortAlgorithm[] = [
        { name: 'Merge', sort: recording, quadratic: false, stable: true }
      ]

      measureAlgorithms(
        { sizes: [4], trials: 2, seed: 0, verify: false },
        { stdout: createStdout(), algorithms }
      )

      expect(seen).toEqual([
        [10, 0, 9, 5],
        [19, 22, 25, 26]
      ])
    })

    it('should draw the same inputs for the same seed', () => {
      const record = () => {
        const seen: unknown[][] = []
        const recording: SortFunction = <T>(input: readonly T[]): T[] => {
          seen.push([...input])
          return input.slice()
        }
        measureAlgorithms(
          { sizes: [8, 16], trials: 3, seed: 11, verify: false },
          {
            stdout: createStdout(),
            algorithms: [{ name: 'Quick', sort: recording, quadratic: false, stable: false }]
          }
        )
        return seen
      }

      expect(record()).toEqual(record())
    })

    it('should not pass the same array to two trials', () => {
      const inputs: unknown[] = []
      const recording: SortFunction = <T>(input: readonly T[]): T[] => {
        inputs.push(input)
        return input.slice()
      }

      measureAlgorithms(
        { sizes: [4], trials: 3, verify: false },
        {
          stdout: createStdout(),
          algorithms: [{ name: 'Merge', sort: recording, quadratic: false, stable: true }]
        }
      )

      expect(new Set(inputs).size).toBe(3)
    })

    it('should fail verification when a sort drops elements', () => {
      const broken: SortFunction = <T>(input: readonly T[]): T[] => input.slice(1)
      const runner = new ExperimentRunner(
        { sizes: [8], trials: 1 },
        {
          stdout: createStdout(),
          algorithms: [{ name: 'Quick', sort: broken, quadratic: false, stable: false }]
        }
      )

      expect(() => runner.measure()).toThrow(SortVerificationError)
      expect(() => runner.measure()).toThrow(
        'Quick: Expected sorted output for n=8, got out-of-order elements'
      )
    })

    it('should skip verification when disabled', () => {
      const broken: SortFunction = <T>(input: readonly T[]): T[] => input.slice(1)
      const measurements = measureAlgorithms(
        { sizes: [8], trials: 1, verify: false },
        {
          stdout: createStdout(),
          algorithms: [{ name: 'Quick', sort: broken, quadratic: false, stable: false }]
        }
      )

      expect(measurements).toHaveLength(1)
    })
  })

  describe('run', () => {
    let tempDir: string

    beforeEach(() => {
      tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'sort-bench-runner-'))
    })

    afterEach(() => {
      fs.rmSync(tempDir, { recursive: true, force: true })
    })

    it('should write results.csv and render the chart into outdir', async () => {
      const stdout = createStdout()
      const chartRenderer = createChartRenderer()
      const outdir = path.join(tempDir, 'nested', 'plots')

      const result = await runExperiments(
        { sizes: [8, 16], trials: 2, outdir },
        { stdout, chartRenderer }
      )

      expect(result.csvPath).toBe(path.join(outdir, 'results.csv'))
      expect(result.chartPath).toBe(path.join(outdir, 'complexity.png'))
      expect(chartRenderer.render).toHaveBeenCalledWith(result.measurements, outdir)

      const rows = fs.readFileSync(result.csvPath, 'utf8').split('\r\n')
      expect(rows[0]).toBe('algorithm,n,avg_seconds,stdev_seconds')
      expect(rows).toHaveLength(1 + 10 + 1)
      expect(rows[rows.length - 1]).toBe('')
      expect(rows[1]).toMatch(/^Bubble,8,\d+\.\d{8},\d+\.\d{8}$/)

      const lines = stdout.lines()
      expect(lines[lines.length - 2]).toBe(`Results saved to ${result.csvPath}`)
      expect(lines[lines.length - 1]).toBe(`Plot saved to ${result.chartPath}`)
    })

    it('should surface an output directory that cannot be created', async () => {
      const blocker = path.join(tempDir, 'blocker')
      fs.writeFileSync(blocker, 'not a directory')
      const chartRenderer = createChartRenderer()

      await expect(
        runExperiments(
          { sizes: [4], trials: 1, outdir: path.join(blocker, 'plots') },
          { stdout: createStdout(), chartRenderer }
        )
      ).rejects.toBeInstanceOf(ArtifactWriteError)
      expect(chartRenderer.render).not.toHaveBeenCalled()
    })
  })
})
