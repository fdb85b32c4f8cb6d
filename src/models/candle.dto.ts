/**
 * Candle intervals the market data client understands
 */
export const CANDLE_INTERVALS = ['1h', '4h', '1d', '1w'] as const

export type CandleInterval = (typeof CANDLE_INTERVALS)[number]

/**
 * OHLCV (Open, High, Low, Close, Volume) candle
 * Represents a single fixed-interval bar of market data
 */
export interface Candle {
  /** Unix timestamp in milliseconds (UTC) marking the start of the interval */
  readonly timestamp: number

  /** Opening price for the time period */
  readonly open: number

  /** Highest price during the time period */
  readonly high: number

  /** Lowest price during the time period */
  readonly low: number

  /** Closing price for the time period */
  readonly close: number

  /** Volume traded during the time period */
  readonly volume: number
}

/**
 * Ordered candles for one symbol and one interval, as produced by a single fetch
 */
export interface CandleSeries {
  /** Trading pair symbol (e.g., 'BTC/USDT') */
  readonly symbol: string

  readonly interval: CandleInterval

  /** Candles ascending by timestamp */
  readonly candles: readonly Candle[]

  /** When the candles were received, Unix milliseconds */
  readonly fetchedAt: number
}

/**
 * Freezes a series and every candle in it
 */
export function createCandleSeries(
  symbol: string,
  interval: CandleInterval,
  candles: readonly Candle[],
  fetchedAt: number
): CandleSeries {
  return Object.freeze({
    symbol,
    interval,
    candles: Object.freeze(candles.map((candle) => Object.freeze({ ...candle }))),
    fetchedAt
  })
}

/**
 * Formats a candle as a string for logging
 */
export function formatCandle(candle: Candle): string {
  const date = new Date(candle.timestamp).toISOString()
  return `${date} O:${candle.open} H:${candle.high} L:${candle.low} C:${candle.close} V:${candle.volume}`
}

/**
 * Sorts candles ascending by timestamp and collapses duplicated timestamps,
 * keeping the row that arrived last
 * @returns The normalized candles and how many rows were dropped or moved
 */
export function normalizeCandles(candles: readonly Candle[]): {
  candles: Candle[]
  duplicates: number
  reordered: boolean
} {
  const byTimestamp = new Map<number, Candle>()
  let reordered = false
  let previous = Number.NEGATIVE_INFINITY

  for (const candle of candles) {
    if (candle.timestamp < previous) {
      reordered = true
    }
    previous = candle.timestamp
    byTimestamp.set(candle.timestamp, candle)
  }

  const normalized = [...byTimestamp.values()].sort((a, b) => a.timestamp - b.timestamp)

  return {
    candles: normalized,
    duplicates: candles.length - normalized.length,
    reordered
  }
}
