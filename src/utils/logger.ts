import createDebug from 'debug'

/**
 * Internal Debug Logger for sort-bench
 *
 * Traces harness internals (resolved configuration, per-size progress,
 * artifact paths). Progress meant for the person running an experiment is
 * written to the run's stdout stream instead.
 *
 * Usage:
 * - Enable with: DEBUG=sort-bench:* npm run experiment
 */

/**
 * Factory for creating debug loggers with consistent namespacing
 */
export class LoggerFactory {
  private static debuggers = new Map<string, createDebug.Debugger>()

  /**
   * Creates a debug logger with the specified namespace
   * @param namespace - The namespace for the logger (will be prefixed with sort-bench:)
   */
  static create(namespace: string): createDebug.Debugger {
    const fullNamespace = `sort-bench:${namespace}`

    const existing = this.debuggers.get(fullNamespace)
    if (existing) {
      return existing
    }

    const logger = createDebug(fullNamespace)
    this.debuggers.set(fullNamespace, logger)
    return logger
  }
}

// Pre-defined loggers for common namespaces
export const coreLogger = (): createDebug.Debugger => LoggerFactory.create('core')
export const configLogger = (): createDebug.Debugger => LoggerFactory.create('config')
export const outputLogger = (): createDebug.Debugger => LoggerFactory.create('output')
export const errorLogger = (): createDebug.Debugger => LoggerFactory.create('error')
