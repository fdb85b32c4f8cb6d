/**
 * Summary figures derived from the latest candles of a series.
 * Recomputed on every render, never cached.
 */
export interface Metrics {
  /** Close of the last candle */
  readonly currentPrice: number

  /** Percent change of the last close against the one before it */
  readonly changePercent: number

  /** High of the last candle */
  readonly dailyHigh: number

  /** Low of the last candle */
  readonly dailyLow: number
}

/**
 * Display strings for a Metrics value
 */
export interface FormattedMetrics {
  readonly price: string
  readonly change: string
  readonly high: string
  readonly low: string
}
