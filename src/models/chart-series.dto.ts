/**
 * Per-symbol presentation attributes
 */
export interface SymbolStyle {
  /** Trading pair symbol (e.g., 'BTC/USDT') */
  readonly symbol: string

  /** Long name shown on metric panels (e.g., 'Bitcoin') */
  readonly displayName: string

  /** Legend name, the base asset of the pair (e.g., 'BTC') */
  readonly shortName: string

  /** Line color as a '#rrggbb' token */
  readonly color: string

  /** Zero-based output position on the metrics row */
  readonly slot: number
}

export interface ChartPoint {
  /** Candle timestamp, Unix milliseconds */
  readonly x: number

  /** Close price */
  readonly y: number
}

/**
 * A line trace ready for a charting front end
 */
export interface RenderableSeries {
  readonly symbol: string
  readonly name: string
  readonly points: readonly ChartPoint[]
  readonly lineColor: string
  /** Translucent variant of lineColor, 'rgba(r, g, b, a)' */
  readonly fillColor: string
  readonly fill: 'tonexty'
}

export interface ChartLayout {
  readonly title: string
  readonly xAxisTitle: string
  readonly yAxisTitle: string
  readonly hoverMode: 'x unified'
  readonly height: number
  readonly template: string
  readonly legend: {
    readonly orientation: 'h' | 'v'
    readonly yAnchor: 'top' | 'bottom'
    readonly y: number
    readonly xAnchor: 'left' | 'right'
    readonly x: number
  }
}

export interface RenderableChart {
  readonly layout: ChartLayout
  readonly series: readonly RenderableSeries[]
}
