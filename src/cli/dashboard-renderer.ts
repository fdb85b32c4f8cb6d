import chalk from 'chalk'
import { getBorderCharacters, table } from 'table'
import type { DashboardSnapshot, DashboardWarning, MetricPanel } from '../dashboard'
import { formatPrice } from '../metrics'
import type { RenderableChart, RenderableSeries } from '../models'

const SPARK_CHARS = '▁▂▃▄▅▆▇█'

export interface RendererOptions {
  /** Emit ANSI colors (default true) */
  color?: boolean
  /** Print dates and the footer in UTC instead of local time */
  utc?: boolean
  /** Maximum sparkline width in characters */
  sparkWidth?: number
}

/**
 * Draws a series of values as block characters, downsampling to `width`
 */
export function sparkline(values: readonly number[], width = 40): string {
  if (values.length === 0) {
    return ''
  }

  const sampled =
    values.length <= width
      ? values
      : Array.from({ length: width }, (_, i) => values[Math.floor((i * values.length) / width)] ?? 0)

  const min = Math.min(...sampled)
  const max = Math.max(...sampled)
  const top = SPARK_CHARS.length - 1

  return sampled
    .map((value) => {
      const level = max === min ? Math.floor(top / 2) : Math.round(((value - min) / (max - min)) * top)
      return SPARK_CHARS[level]
    })
    .join('')
}

function pad(value: number): string {
  return String(value).padStart(2, '0')
}

/**
 * Formats Unix milliseconds as 'YYYY-MM-DD HH:mm:ss'
 */
export function formatDateTime(ms: number, utc = false): string {
  const d = new Date(ms)
  const parts = utc
    ? [d.getUTCFullYear(), d.getUTCMonth() + 1, d.getUTCDate(), d.getUTCHours(), d.getUTCMinutes(), d.getUTCSeconds()]
    : [d.getFullYear(), d.getMonth() + 1, d.getDate(), d.getHours(), d.getMinutes(), d.getSeconds()]
  const [year = 0, month = 0, day = 0, hours = 0, minutes = 0, seconds = 0] = parts
  return `${year}-${pad(month)}-${pad(day)} ${pad(hours)}:${pad(minutes)}:${pad(seconds)}`
}

export function formatDate(ms: number, utc = false): string {
  return formatDateTime(ms, utc).slice(0, 10)
}

/**
 * Renders dashboard snapshots for a terminal
 */
export class DashboardRenderer {
  private readonly chalk: chalk.Chalk
  private readonly utc: boolean
  private readonly sparkWidth: number

  constructor(options: RendererOptions = {}) {
    this.chalk = new chalk.Instance({ level: options.color === false ? 0 : chalk.level })
    this.utc = options.utc ?? false
    this.sparkWidth = options.sparkWidth ?? 40
  }

  render(snapshot: DashboardSnapshot): string {
    const lines = [
      this.chalk.bold(`Cryptocurrency Dashboard (last ${snapshot.days} days)`),
      '',
      this.chalk.bold(snapshot.chart.layout.title),
      ...this.renderChart(snapshot.chart),
      '',
      this.chalk.bold('Market Overview'),
      this.renderPanels(snapshot.panels).trimEnd(),
      ...this.renderWarnings(snapshot.warnings),
      '',
      this.footer(snapshot.generatedAt)
    ]
    return lines.join('\n')
  }

  renderChart(chart: RenderableChart): string[] {
    if (chart.series.length === 0) {
      return [this.chalk.dim('No data available')]
    }
    return chart.series.map((series) => this.renderSeries(series))
  }

  renderSeries(series: RenderableSeries): string {
    const label = series.name.padEnd(4)
    const first = series.points[0]
    const last = series.points.at(-1)
    if (!first || !last) {
      return `${label} ${this.chalk.dim('(no data)')}`
    }

    const spark = this.chalk.hex(series.lineColor)(
      sparkline(series.points.map((point) => point.y), this.sparkWidth)
    )
    const dates = `${formatDate(first.x, this.utc)} → ${formatDate(last.x, this.utc)}`
    const prices = `${formatPrice(first.y)} → ${formatPrice(last.y)}`
    return `${label} ${spark}  ${dates}  ${prices}`
  }

  /**
   * Table cells for the metric panels, header first, in slot order
   */
  panelRows(panels: readonly MetricPanel[]): string[][] {
    const header = ['Asset', 'Price', 'Change', '24h High', '24h Low']
    const rows = [...panels]
      .sort((a, b) => a.slot - b.slot)
      .map((panel) => {
        if (!panel.display || !panel.metrics) {
          return [panel.displayName, 'n/a', 'n/a', 'n/a', 'n/a']
        }
        const colorChange = panel.metrics.changePercent >= 0 ? this.chalk.green : this.chalk.red
        return [
          panel.displayName,
          panel.display.price,
          colorChange(panel.display.change),
          panel.display.high,
          panel.display.low
        ]
      })
    return [header.map((cell) => this.chalk.bold(cell)), ...rows]
  }

  renderPanels(panels: readonly MetricPanel[]): string {
    if (panels.length === 0) {
      return this.chalk.dim('No market data')
    }
    return table(this.panelRows(panels), {
      border: getBorderCharacters('norc'),
      columns: [{ alignment: 'left' }, { alignment: 'right' }, { alignment: 'right' }, { alignment: 'right' }, { alignment: 'right' }]
    })
  }

  renderWarnings(warnings: readonly DashboardWarning[]): string[] {
    return warnings.map((warning) => this.chalk.yellow(`⚠ ${warning.message}`))
  }

  footer(generatedAt: number): string {
    return this.chalk.dim(`Last updated: ${formatDateTime(generatedAt, this.utc)}`)
  }
}
