/**
 * sort-bench CLI
 *
 * Runs the sorting complexity experiment over a power-of-two size sweep.
 *
 * Usage:
 *   tsx src/cli.ts [--min-power N] [--max-power N] [--trials N] [--seed N] [--outdir DIR]
 */

import { parseArgs } from 'node:util'
import { fileURLToPath } from 'node:url'
import { z } from 'zod'
import type { ExperimentOptions, ProgressStream } from './types/experiment'
import { runExperiments, type ExperimentDependencies } from './benchmark/ExperimentRunner'
import {
  DEFAULT_EXPERIMENT_CONFIG,
  DEFAULT_MAX_POWER,
  DEFAULT_MIN_POWER,
  sizesFromPowers
} from './config/experiment-config'
import { ErrorMessages, UsageError } from './validation/errors'
import { errorLogger } from './utils/logger'

/** Largest accepted power of two (2^24 elements per input) */
export const MAX_POWER = 24

export const USAGE = `Usage: sort-bench [options]

Run sorting algorithm experiments

Options:
  --min-power N   minimum power of two for n (default ${DEFAULT_MIN_POWER} -> ${2 ** DEFAULT_MIN_POWER})
  --max-power N   maximum power of two for n (default ${DEFAULT_MAX_POWER} -> ${2 ** DEFAULT_MAX_POWER})
  --trials N      number of trials per size (default ${DEFAULT_EXPERIMENT_CONFIG.trials})
  --seed N        random seed (default ${DEFAULT_EXPERIMENT_CONFIG.seed})
  --outdir DIR    output directory for plots and CSV (default: plots/ at the package root)
  -h, --help      show this help`

/** Exit status for rejected arguments */
export const EXIT_USAGE = 2
/** Exit status for a failed run */
export const EXIT_FAILURE = 1

const integerFlag = (flag: string) =>
  z
    .string()
    .regex(/^[+-]?\d+$/, { message: ErrorMessages.INVALID_VALUE(flag, 'an integer', 'non-integer') })
    .transform(Number)

const powerFlag = (flag: string) =>
  integerFlag(flag).pipe(
    z
      .number()
      .min(0, { message: ErrorMessages.INVALID_VALUE(flag, `a power in [0, ${MAX_POWER}]`, 'a negative value') })
      .max(MAX_POWER, {
        message: ErrorMessages.INVALID_VALUE(flag, `a power in [0, ${MAX_POWER}]`, 'a larger value')
      })
  )

const CliArgsSchema = z.object({
  minPower: powerFlag('--min-power'),
  maxPower: powerFlag('--max-power'),
  trials: integerFlag('--trials').pipe(
    z.number().min(1, { message: ErrorMessages.INVALID_VALUE('--trials', 'value >= 1', 'a smaller value') })
  ),
  seed: integerFlag('--seed').pipe(
    z.number().safe({ message: ErrorMessages.INVALID_VALUE('--seed', 'a safe integer', 'a larger value') })
  ),
  outdir: z.string().min(1, { message: ErrorMessages.INVALID_VALUE('--outdir', 'a directory', 'an empty string') }).optional()
})

/**
 * Parsed command line
 */
export type CliCommand =
  | { readonly kind: 'help' }
  | { readonly kind: 'run'; readonly options: ExperimentOptions }

const VALUE_FLAGS = new Set(['--min-power', '--max-power', '--trials', '--seed', '--outdir'])

/**
 * Joins `--flag -5` into `--flag=-5` so negative numbers are read as values
 * rather than as options
 */
export function joinNegativeValues(argv: readonly string[]): string[] {
  const args: string[] = []
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i]
    const next = argv[i + 1]
    if (VALUE_FLAGS.has(arg) && next !== undefined && /^-\d+$/.test(next)) {
      args.push(`${arg}=${next}`)
      i++
    } else {
      args.push(arg)
    }
  }
  return args
}

function readFlags(argv: readonly string[]) {
  try {
    return parseArgs({
      args: joinNegativeValues(argv),
      options: {
        'min-power': { type: 'string', default: String(DEFAULT_MIN_POWER) },
        'max-power': { type: 'string', default: String(DEFAULT_MAX_POWER) },
        trials: { type: 'string', default: String(DEFAULT_EXPERIMENT_CONFIG.trials) },
        seed: { type: 'string', default: String(DEFAULT_EXPERIMENT_CONFIG.seed) },
        outdir: { type: 'string' },
        help: { type: 'boolean', short: 'h', default: false }
      },
      strict: true,
      allowPositionals: false
    }).values
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    throw new UsageError(message, USAGE)
  }
}

/**
 * Parses command-line arguments into experiment options
 * @throws UsageError on unknown flags, positionals or invalid values
 */
export function parseCliArgs(argv: readonly string[]): CliCommand {
  const values = readFlags(argv)

  if (values.help) {
    return { kind: 'help' }
  }

  const parsed = CliArgsSchema.safeParse({
    minPower: values['min-power'],
    maxPower: values['max-power'],
    trials: values.trials,
    seed: values.seed,
    outdir: values.outdir
  })

  if (!parsed.success) {
    throw new UsageError(parsed.error.issues.map((issue) => issue.message).join('\n'), USAGE)
  }

  const args = parsed.data
  if (args.maxPower < args.minPower) {
    throw new UsageError(ErrorMessages.POWER_ORDER(args.minPower, args.maxPower), USAGE)
  }

  return {
    kind: 'run',
    options: {
      sizes: sizesFromPowers(args.minPower, args.maxPower),
      trials: args.trials,
      seed: args.seed,
      outdir: args.outdir
    }
  }
}

/**
 * Streams and collaborators the CLI runs with
 */
export interface CliIO extends ExperimentDependencies {
  readonly stdout: ProgressStream
  readonly stderr: ProgressStream
}

/**
 * Runs the CLI and resolves to the process exit status
 */
export async function main(
  argv: readonly string[],
  io: CliIO = { stdout: process.stdout, stderr: process.stderr }
): Promise<number> {
  let command: CliCommand
  try {
    command = parseCliArgs(argv)
  } catch (error) {
    if (error instanceof UsageError) {
      io.stderr.write(`${error.usage}\n\nsort-bench: error: ${error.message}\n`)
      return EXIT_USAGE
    }
    throw error
  }

  if (command.kind === 'help') {
    io.stdout.write(`${USAGE}\n`)
    return 0
  }

  try {
    await runExperiments(command.options, io)
    return 0
  } catch (error) {
    errorLogger()('Experiment failed: %O', error)
    const message = error instanceof Error ? error.message : String(error)
    io.stderr.write(`sort-bench: ${message}\n`)
    return EXIT_FAILURE
  }
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  main(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code
    },
    (error: unknown) => {
      console.error(error)
      process.exitCode = EXIT_FAILURE
    }
  )
}
