import type { Candle, CandleSeries } from '../../src/models'
import { createCandleSeries } from '../../src/models'

export const DAY_MS = 86_400_000

/** 2026-01-01T00:00:00Z */
export const START = Date.UTC(2026, 0, 1)

/**
 * Daily candles with the given closes; open is the previous close,
 * high and low sit 1% around the larger and smaller of open and close
 */
export function makeCandles(closes: readonly number[], start = START): Candle[] {
  return closes.map((close, i) => {
    const open = i === 0 ? close : (closes[i - 1] ?? close)
    return {
      timestamp: start + i * DAY_MS,
      open,
      high: Math.max(open, close) * 1.01,
      low: Math.min(open, close) * 0.99,
      close,
      volume: 1000 + i
    }
  })
}

export function makeSeries(closes: readonly number[], symbol = 'BTC/USDT'): CandleSeries {
  return createCandleSeries(symbol, '1d', makeCandles(closes), START + closes.length * DAY_MS)
}

/**
 * Manually advanced clock
 */
export class ManualClock {
  constructor(public current = START) {}

  now = (): number => this.current

  advance(ms: number): void {
    this.current += ms
  }
}
