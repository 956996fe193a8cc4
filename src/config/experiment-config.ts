/**
 * Experiment configuration
 *
 * Defaults, validation and normalization of the options accepted by
 * `runExperiments`.
 *
 * @module config/experiment-config
 */

import { fileURLToPath } from 'node:url'
import { z } from 'zod'
import type { ExperimentConfig, ExperimentOptions } from '../types/experiment'
import { ConfigValidationError } from '../validation/errors'
import { configLogger } from '../utils/logger'

const debug = configLogger()

/**
 * Plots directory at the package root
 */
export const DEFAULT_OUTDIR = fileURLToPath(new URL('../../plots', import.meta.url))

/**
 * Default power-of-two bounds for the size sweep (2^7 = 128 .. 2^12 = 4096)
 */
export const DEFAULT_MIN_POWER = 7
export const DEFAULT_MAX_POWER = 12

/**
 * Default experiment configuration values
 */
export const DEFAULT_EXPERIMENT_CONFIG: ExperimentConfig = {
  sizes: [128, 256, 512, 1024, 2048, 4096],
  trials: 3,
  outdir: DEFAULT_OUTDIR,
  seed: 0,
  maxQuadraticSize: 1024,
  verify: true
}

export const ExperimentConfigSchema = z.object({
  sizes: z
    .array(z.number().int().positive(), { invalid_type_error: 'sizes must be an array' })
    .nonempty('sizes must contain at least one size'),
  trials: z.number().int().positive(),
  outdir: z.string().min(1, 'outdir must not be empty'),
  seed: z.number().int(),
  maxQuadraticSize: z.number().int().positive(),
  verify: z.boolean()
})

/**
 * Sizes 2^minPower through 2^maxPower inclusive
 */
export function sizesFromPowers(minPower: number, maxPower: number): number[] {
  const sizes: number[] = []
  for (let power = minPower; power <= maxPower; power++) {
    sizes.push(2 ** power)
  }
  return sizes
}

/**
 * Merge caller options over the defaults and validate the result
 * @throws ConfigValidationError listing every invalid field
 */
export function resolveExperimentConfig(options: ExperimentOptions = {}): ExperimentConfig {
  const candidate = {
    sizes: options.sizes ?? DEFAULT_EXPERIMENT_CONFIG.sizes,
    trials: options.trials ?? DEFAULT_EXPERIMENT_CONFIG.trials,
    outdir: options.outdir ?? DEFAULT_EXPERIMENT_CONFIG.outdir,
    seed: options.seed ?? DEFAULT_EXPERIMENT_CONFIG.seed,
    maxQuadraticSize: options.maxQuadraticSize ?? DEFAULT_EXPERIMENT_CONFIG.maxQuadraticSize,
    verify: options.verify ?? DEFAULT_EXPERIMENT_CONFIG.verify
  }

  const parsed = ExperimentConfigSchema.safeParse(candidate)
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join('.') : 'config'
      return `${path}: ${issue.message}`
    })
    debug('Rejected configuration: %O', issues)
    throw new ConfigValidationError(issues)
  }

  debug('Resolved configuration: %O', parsed.data)
  return parsed.data
}
