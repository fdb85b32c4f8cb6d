import { InsufficientDataError, InvalidPriceError } from '../dashboard/errors'
import type { CandleSeries, Metrics } from '../models'

/**
 * Derives summary metrics from the two most recent candles of a series
 *
 * - currentPrice: close of the last candle
 * - changePercent: (last close - previous close) / previous close * 100
 * - dailyHigh / dailyLow: high and low of the last candle alone, not of the window
 *
 * @throws InsufficientDataError when the series holds fewer than 2 candles
 * @throws InvalidPriceError when the previous close is zero, negative or not finite
 */
export function computeMetrics(series: CandleSeries): Metrics {
  const { candles, symbol } = series
  const last = candles.at(-1)
  const previous = candles.at(-2)

  if (!last || !previous) {
    throw new InsufficientDataError(symbol, candles.length)
  }

  const reference = previous.close
  if (!Number.isFinite(reference) || reference <= 0) {
    throw new InvalidPriceError(symbol, reference)
  }

  return {
    currentPrice: last.close,
    changePercent: ((last.close - reference) / reference) * 100,
    dailyHigh: last.high,
    dailyLow: last.low
  }
}
