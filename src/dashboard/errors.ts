/**
 * Base class for every error the dashboard core raises
 */
export class DashboardError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'DashboardError'
  }
}

/**
 * Error thrown when candles for a symbol could not be fetched
 */
export class DataFetchError extends DashboardError {
  constructor(
    public readonly symbol: string,
    cause: unknown
  ) {
    super(
      `Error fetching data for ${symbol}: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause }
    )
    this.name = 'DataFetchError'
  }
}

/**
 * Error thrown when a series is too short to derive metrics from
 */
export class InsufficientDataError extends DashboardError {
  constructor(
    public readonly symbol: string,
    public readonly count: number
  ) {
    super(`Not enough candles for ${symbol}: need at least 2, got ${count}`)
    this.name = 'InsufficientDataError'
  }
}

/**
 * Error thrown when a reference price cannot be divided by
 */
export class InvalidPriceError extends DashboardError {
  constructor(
    public readonly symbol: string,
    public readonly price: number
  ) {
    super(`Invalid reference price for ${symbol}: ${price}`)
    this.name = 'InvalidPriceError'
  }
}

export class UnknownSymbolError extends DashboardError {
  constructor(public readonly symbol: string) {
    super(`Unknown symbol: ${symbol}`)
    this.name = 'UnknownSymbolError'
  }
}

export class UnsupportedWindowError extends DashboardError {
  constructor(public readonly days: number) {
    super(`Unsupported day window: ${days}. Must be one of 7, 30, 90`)
    this.name = 'UnsupportedWindowError'
  }
}

/**
 * Error thrown when the exchange returns a row that is not a valid candle
 */
export class MalformedCandleError extends DashboardError {
  constructor(
    public readonly symbol: string,
    public readonly index: number,
    detail: string
  ) {
    super(`Malformed candle at index ${index} for ${symbol}: ${detail}`)
    this.name = 'MalformedCandleError'
  }
}
