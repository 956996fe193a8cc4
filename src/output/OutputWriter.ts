/**
 * Output Writer
 *
 * Handles file I/O for experiment artifacts: resolving paths, creating the
 * output directory and writing text or binary content.
 *
 * @module output
 */

import * as fs from 'node:fs'
import * as path from 'node:path'
import { ArtifactWriteError } from '../validation/errors'
import { outputLogger } from '../utils/logger'

/**
 * Output writer configuration
 */
export interface OutputWriterConfig {
  /** Whether to create directories if they don't exist */
  createDirectories?: boolean
}

/**
 * Default writer configuration
 */
export const DEFAULT_WRITER_CONFIG: Required<OutputWriterConfig> = {
  createDirectories: true
}

/**
 * Anything that writes one artifact and returns its absolute path
 */
export type ArtifactWriter = Pick<OutputWriter, 'write'>

/**
 * Writes experiment artifacts into an output directory
 *
 * Failures are not retried: they surface as {@link ArtifactWriteError}
 * carrying the path and the underlying cause.
 *
 * @example
 * ```typescript
 * const writer = new OutputWriter();
 * const csvPath = writer.write('plots', 'results.csv', csvText);
 * ```
 */
export class OutputWriter {
  private config: Required<OutputWriterConfig>
  private debug = outputLogger()

  constructor(config: OutputWriterConfig = {}) {
    this.config = { ...DEFAULT_WRITER_CONFIG, ...config }
  }

  /**
   * Writes `content` to `fileName` inside `outdir`
   *
   * @returns The absolute path of the written file
   * @throws ArtifactWriteError if the directory or the file cannot be written
   */
  public write(outdir: string, fileName: string, content: string | Uint8Array): string {
    const directory = this.prepareDirectory(outdir)
    const absolutePath = path.join(directory, fileName)

    try {
      fs.writeFileSync(absolutePath, content)
    } catch (error) {
      throw new ArtifactWriteError(absolutePath, error)
    }

    this.debug('Wrote %s', absolutePath)
    return absolutePath
  }

  /**
   * Resolves the output directory, creating it if needed
   *
   * @returns The absolute directory path
   * @throws ArtifactWriteError if the directory cannot be created
   */
  public prepareDirectory(outdir: string): string {
    const absoluteDir = path.resolve(outdir)

    if (this.config.createDirectories) {
      try {
        fs.mkdirSync(absoluteDir, { recursive: true })
      } catch (error) {
        throw new ArtifactWriteError(absoluteDir, error)
      }
    }

    return absoluteDir
  }
}
