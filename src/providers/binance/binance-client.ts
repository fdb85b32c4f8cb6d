import { binance } from 'ccxt'
import { z } from 'zod'
import { MalformedCandleError } from '../../dashboard/errors'
import type { MarketDataClient } from '../../interfaces'
import type { Candle, CandleInterval } from '../../models'
import { normalizeCandles } from '../../models'
import logger from '../../utils/logger'
import type { BinanceConfig, OhlcvExchange } from './types'

const price = z.number().nonnegative()

/**
 * Schema for one ccxt OHLCV row
 */
const ohlcvRowSchema = z.tuple([
  z.number().int().nonnegative(),
  price,
  price,
  price,
  price,
  price
])

/**
 * Binance market data client
 * Uses ccxt's unified REST API for candle history
 */
export class BinanceClient implements MarketDataClient {
  readonly name = 'binance'
  private readonly exchange: OhlcvExchange

  constructor(config: BinanceConfig = {}, exchange?: OhlcvExchange) {
    this.exchange =
      exchange ??
      new binance({
        enableRateLimit: config.enableRateLimit ?? true,
        timeout: config.timeoutMs ?? 10_000
      })

    logger.debug('BinanceClient initialized', { exchange: this.exchange.id })
  }

  async fetchOHLCV(symbol: string, interval: CandleInterval, limit: number): Promise<Candle[]> {
    logger.debug('Fetching candles', { symbol, interval, limit })

    const rows = await this.exchange.fetchOHLCV(symbol, interval, undefined, limit)
    const candles = rows.map((row, index) => this.convertRow(symbol, row, index))
    const normalized = normalizeCandles(candles)

    if (normalized.duplicates > 0 || normalized.reordered) {
      logger.warn('Exchange returned unordered or duplicate candles', {
        symbol,
        duplicates: normalized.duplicates,
        reordered: normalized.reordered
      })
    }

    logger.debug('Candle fetch completed', { symbol, count: normalized.candles.length })
    return normalized.candles
  }

  async close(): Promise<void> {
    logger.debug('BinanceClient closed')
  }

  private convertRow(symbol: string, row: unknown[], index: number): Candle {
    const parsed = ohlcvRowSchema.safeParse(row)
    if (!parsed.success) {
      throw new MalformedCandleError(
        symbol,
        index,
        parsed.error.issues.map((issue) => `${issue.path.map(String).join('.')}: ${issue.message}`).join('; ')
      )
    }

    const [timestamp, open, high, low, close, volume] = parsed.data
    return { timestamp, open, high, low, close, volume }
  }
}
