import type {
  CandleSeries,
  ChartLayout,
  RenderableChart,
  RenderableSeries,
  SymbolStyle
} from '../models'

/** Opacity of the area under each price line */
export const FILL_OPACITY = 0.2

const HEX_COLOR = /^#?([0-9a-fA-F]{2})([0-9a-fA-F]{2})([0-9a-fA-F]{2})$/

export const DEFAULT_CHART_LAYOUT: ChartLayout = {
  title: 'Cryptocurrency Prices',
  xAxisTitle: 'Date',
  yAxisTitle: 'Price (USDT)',
  hoverMode: 'x unified',
  height: 600,
  template: 'plotly_white',
  legend: {
    orientation: 'h',
    yAnchor: 'bottom',
    y: 1.02,
    xAnchor: 'right',
    x: 1
  }
}

export function isHexColor(color: string): boolean {
  return HEX_COLOR.test(color)
}

/**
 * Derives a translucent fill from a line color by reusing its RGB channels
 * @param color A '#rrggbb' token
 * @returns 'rgba(r, g, b, alpha)'
 * @throws TypeError if the color is not three hex byte pairs
 */
export function deriveFillColor(color: string, alpha = FILL_OPACITY): string {
  const match = HEX_COLOR.exec(color)
  if (!match) {
    throw new TypeError(`Expected a #rrggbb color, got '${color}'`)
  }

  const [, red = '', green = '', blue = ''] = match
  const channels = [red, green, blue].map((pair) => parseInt(pair, 16))
  return `rgba(${channels.join(', ')}, ${alpha})`
}

/**
 * Maps a candle series to a line trace of close prices over time.
 * Order and count are preserved; gaps are neither filled nor resampled.
 */
export function buildChartSeries(series: CandleSeries, style: SymbolStyle): RenderableSeries {
  return {
    symbol: series.symbol,
    name: style.shortName,
    points: series.candles.map((candle) => ({ x: candle.timestamp, y: candle.close })),
    lineColor: style.color,
    fillColor: deriveFillColor(style.color),
    fill: 'tonexty'
  }
}

/**
 * Combines traces under the dashboard's chart layout
 */
export function buildChart(
  series: readonly RenderableSeries[],
  layout: ChartLayout = DEFAULT_CHART_LAYOUT
): RenderableChart {
  return { layout, series }
}
