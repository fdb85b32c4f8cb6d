import type { Candle, CandleInterval } from '../models'

/**
 * Interface the dashboard consumes market data through.
 * One exchange, one operation; rate limiting and timeouts belong to the implementation.
 */
export interface MarketDataClient {
  /** Exchange identifier (e.g., 'binance') */
  readonly name: string

  /**
   * Fetches the most recent candles for a symbol
   * @param symbol Trading pair in exchange-unified form (e.g., 'BTC/USDT')
   * @param interval Candle interval
   * @param limit Maximum number of candles to return
   * @returns Candles ascending by timestamp, at most `limit` of them
   * @throws Error on transport or exchange failure
   */
  fetchOHLCV(symbol: string, interval: CandleInterval, limit: number): Promise<Candle[]>

  /**
   * Releases any resources held by the client
   */
  close(): Promise<void>
}
