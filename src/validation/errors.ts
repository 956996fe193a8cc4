/**
 * Error definitions
 *
 * Centralized error messages and the error classes the harness and CLI throw
 */

/**
 * Standardized error messages with consistent format
 * Format: ${path}: Expected ${expected}, got ${actual}
 */
export const ErrorMessages = {
  INVALID_VALUE: (path: string, expected: string, actual: string): string =>
    `${path}: Expected ${expected}, got ${actual}`,
  POWER_ORDER: (min: number, max: number): string =>
    `--max-power: Expected value >= --min-power (${min}), got ${max}`,
  UNSORTED_OUTPUT: (algorithm: string, n: number): string =>
    `${algorithm}: Expected sorted output for n=${n}, got out-of-order elements`,
  WRITE_FAILED: (path: string, reason: string): string =>
    `Failed to write ${path}: ${reason}`
}

/**
 * Base class for errors raised by sort-bench
 */
export class SortBenchError extends Error {
  public readonly code: string

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options)
    this.name = this.constructor.name
    this.code = code
  }
}

/**
 * Harness options failed validation
 */
export class ConfigValidationError extends SortBenchError {
  public readonly issues: readonly string[]

  constructor(issues: readonly string[]) {
    super(`Invalid experiment configuration:\n  ${issues.join('\n  ')}`, 'INVALID_CONFIG')
    this.issues = issues
  }
}

/**
 * Command-line arguments could not be parsed
 */
export class UsageError extends SortBenchError {
  public readonly usage: string

  constructor(message: string, usage: string) {
    super(message, 'USAGE')
    this.usage = usage
  }
}

/**
 * An artifact or its directory could not be written
 */
export class ArtifactWriteError extends SortBenchError {
  public readonly path: string

  constructor(path: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause)
    super(ErrorMessages.WRITE_FAILED(path, reason), 'WRITE_FAILED', { cause })
    this.path = path
  }
}

/**
 * A verified run caught a sort returning out-of-order output
 */
export class SortVerificationError extends SortBenchError {
  constructor(algorithm: string, n: number) {
    super(ErrorMessages.UNSORTED_OUTPUT(algorithm, n), 'UNSORTED_OUTPUT')
  }
}
