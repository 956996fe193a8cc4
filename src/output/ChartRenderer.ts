/**
 * Chart Renderer
 *
 * Draws the complexity chart: input size on a base-2 logarithmic x-axis,
 * mean time on a logarithmic y-axis, one line per algorithm with +/-1
 * standard deviation error bars. The chart is described in Vega-Lite,
 * rendered to SVG by Vega's headless view and encoded as PNG by sharp.
 *
 * @module output/ChartRenderer
 */

import sharp from 'sharp'
import { parse, View } from 'vega'
import { compile, type TopLevelSpec } from 'vega-lite'
import type { AggregatedMeasurement } from '../types/experiment'
import { OutputWriter, type ArtifactWriter } from './OutputWriter'
import { outputLogger } from '../utils/logger'

export const CHART_FILE_NAME = 'complexity.png'

export const CHART_TITLE = 'Sorting algorithms: execution time vs input size'

/**
 * One plotted point with its error bar bounds
 */
export interface ChartPoint {
  readonly algorithm: string
  readonly n: number
  readonly avgSeconds: number
  readonly lower: number
  readonly upper: number
}

/**
 * Chart renderer configuration
 */
export interface ChartRendererConfig {
  /** Plot width in pixels (default: 800) */
  width?: number
  /** Plot height in pixels (default: 480) */
  height?: number
  /** Rasterization density in DPI (default: 144) */
  density?: number
}

const DEFAULT_CHART_CONFIG: Required<ChartRendererConfig> = {
  width: 800,
  height: 480,
  density: 144
}

/**
 * Converts measurements into plotted points.
 *
 * A log axis cannot show a non-positive lower bound, so when the standard
 * deviation reaches the mean the bar is drawn upward only.
 */
export function toChartPoints(measurements: readonly AggregatedMeasurement[]): ChartPoint[] {
  return measurements.map((measurement) => {
    const lower = measurement.avgSeconds - measurement.stdevSeconds
    return {
      algorithm: measurement.algorithm,
      n: measurement.n,
      avgSeconds: measurement.avgSeconds,
      lower: lower > 0 ? lower : measurement.avgSeconds,
      upper: measurement.avgSeconds + measurement.stdevSeconds
    }
  })
}

/**
 * Builds the Vega-Lite description of the chart
 */
export function buildChartSpec(
  measurements: readonly AggregatedMeasurement[],
  config: ChartRendererConfig = {}
): TopLevelSpec {
  const { width, height } = { ...DEFAULT_CHART_CONFIG, ...config }

  return {
    $schema: 'https://vega.github.io/schema/vega-lite/v5.json',
    title: CHART_TITLE,
    width,
    height,
    background: 'white',
    data: { values: toChartPoints(measurements) },
    encoding: {
      x: {
        field: 'n',
        type: 'quantitative',
        title: 'Input size (n)',
        scale: { type: 'log', base: 2 }
      },
      color: { field: 'algorithm', type: 'nominal', title: 'Algorithm' }
    },
    layer: [
      {
        mark: { type: 'line', point: true },
        encoding: {
          y: {
            field: 'avgSeconds',
            type: 'quantitative',
            title: 'Time (seconds)',
            scale: { type: 'log' }
          }
        }
      },
      {
        mark: { type: 'rule' },
        encoding: {
          y: { field: 'lower', type: 'quantitative' },
          y2: { field: 'upper' }
        }
      }
    ]
  }
}

/**
 * Renders the chart to an SVG document
 */
export async function renderChartSvg(
  measurements: readonly AggregatedMeasurement[],
  config: ChartRendererConfig = {}
): Promise<string> {
  const vegaSpec = compile(buildChartSpec(measurements, config)).spec
  const view = new View(parse(vegaSpec), { renderer: 'none' })

  try {
    return await view.toSVG()
  } finally {
    view.finalize()
  }
}

/**
 * Renders complexity charts as PNG files
 */
export class ChartRenderer {
  private config: Required<ChartRendererConfig>
  private writer: ArtifactWriter
  private debug = outputLogger()

  constructor(config: ChartRendererConfig = {}, writer: ArtifactWriter = new OutputWriter()) {
    this.config = { ...DEFAULT_CHART_CONFIG, ...config }
    this.writer = writer
  }

  /**
   * Renders the chart for `measurements` into `outdir`
   *
   * @returns The absolute path of the written PNG
   */
  async render(measurements: readonly AggregatedMeasurement[], outdir: string): Promise<string> {
    this.debug('Rendering chart for %d measurements', measurements.length)

    const svg = await renderChartSvg(measurements, this.config)
    const png = await sharp(Buffer.from(svg), { density: this.config.density }).png().toBuffer()

    return this.writer.write(outdir, CHART_FILE_NAME, png)
  }
}
