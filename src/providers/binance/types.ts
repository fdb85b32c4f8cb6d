/**
 * Binance-specific type definitions
 */

/**
 * Configuration options for the Binance client
 */
export interface BinanceConfig {
  /** Let ccxt throttle requests to the exchange's published limits */
  enableRateLimit?: boolean

  /** Request timeout in milliseconds */
  timeoutMs?: number
}

/**
 * The slice of a ccxt exchange the client calls.
 * Rows are [timestamp, open, high, low, close, volume].
 */
export interface OhlcvExchange {
  readonly id: string
  fetchOHLCV(
    symbol: string,
    timeframe?: string,
    since?: number,
    limit?: number
  ): Promise<unknown[][]>
}
