import type { MarketDataClient } from '../../src/interfaces'
import type { Candle, CandleInterval } from '../../src/models'

export interface FetchCall {
  symbol: string
  interval: CandleInterval
  limit: number
}

type Response = Candle[] | Error | (() => Promise<Candle[]>)

/**
 * In-process stand-in for the exchange client.
 * Responses are set per symbol; unset symbols fail.
 */
export class FakeMarketDataClient implements MarketDataClient {
  readonly name = 'fake'
  readonly calls: FetchCall[] = []
  closed = false
  private readonly responses = new Map<string, Response>()

  respond(symbol: string, response: Response): this {
    this.responses.set(symbol, response)
    return this
  }

  callsFor(symbol: string): FetchCall[] {
    return this.calls.filter((call) => call.symbol === symbol)
  }

  async fetchOHLCV(symbol: string, interval: CandleInterval, limit: number): Promise<Candle[]> {
    this.calls.push({ symbol, interval, limit })
    const response = this.responses.get(symbol)
    if (response === undefined) {
      throw new Error(`No response configured for ${symbol}`)
    }
    if (response instanceof Error) {
      throw response
    }
    if (typeof response === 'function') {
      return response()
    }
    return response.slice(0, limit)
  }

  async close(): Promise<void> {
    this.closed = true
  }
}

/**
 * A promise with its resolve and reject exposed
 */
export function deferred<T>(): {
  promise: Promise<T>
  resolve: (value: T) => void
  reject: (error: unknown) => void
} {
  let resolve: (value: T) => void = () => undefined
  let reject: (error: unknown) => void = () => undefined
  const promise = new Promise<T>((res, rej) => {
    resolve = res
    reject = rej
  })
  return { promise, resolve, reject }
}
