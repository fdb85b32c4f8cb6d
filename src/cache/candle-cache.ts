import { DataFetchError } from '../dashboard/errors'
import type { MarketDataClient } from '../interfaces'
import type { Candle, CandleInterval, CandleSeries } from '../models'
import { createCandleSeries } from '../models'
import logger from '../utils/logger'

/** Default time-to-live for cached candles: five minutes */
export const DEFAULT_TTL_MS = 300_000

/**
 * Identifies one distinct fetch request
 */
export interface CacheKey {
  readonly symbol: string
  readonly interval: CandleInterval
  readonly count: number
}

export interface CacheEntry {
  readonly key: CacheKey
  readonly value: CandleSeries
  readonly fetchedAt: number
}

export interface CandleCacheOptions {
  /** Time-to-live in milliseconds */
  ttlMs?: number
  /** Clock returning Unix milliseconds */
  now?: () => number
}

export interface CandleCacheStats {
  hits: number
  misses: number
  fetches: number
  failures: number
  size: number
}

interface InFlight {
  readonly promise: Promise<CandleSeries>
  readonly generation: number
}

/**
 * Serializes a cache key; two keys are equal when their strings are
 */
export function cacheKeyToString(key: CacheKey): string {
  return `${key.symbol}|${key.interval}|${key.count}`
}

/**
 * Time-bounded memo of market data fetches, one entry per key.
 * Failed fetches are never stored.
 *
 * At most one fetch per key runs in each generation and only the current
 * generation writes, so a stored entry is always the latest completed fetch.
 */
export class CandleCache {
  private readonly entries = new Map<string, CacheEntry>()
  private readonly inFlight = new Map<string, InFlight>()
  private readonly ttlMs: number
  private readonly now: () => number
  // Bumped by clearAll; fetches started under an older generation are not stored
  private generation = 0
  private hits = 0
  private misses = 0
  private fetches = 0
  private failures = 0

  constructor(
    private readonly client: MarketDataClient,
    options: CandleCacheOptions = {}
  ) {
    this.ttlMs = options.ttlMs ?? DEFAULT_TTL_MS
    this.now = options.now ?? Date.now

    if (!Number.isFinite(this.ttlMs) || this.ttlMs <= 0) {
      throw new RangeError(`Cache TTL must be a positive number of milliseconds, got ${this.ttlMs}`)
    }
  }

  /**
   * Returns cached candles for the key, fetching them when absent or expired
   * @throws DataFetchError when the underlying fetch fails
   */
  async get(key: CacheKey): Promise<CandleSeries> {
    const id = cacheKeyToString(key)
    const entry = this.peek(key)
    if (entry) {
      this.hits++
      return entry.value
    }

    this.misses++

    const pending = this.inFlight.get(id)
    if (pending && pending.generation === this.generation) {
      return pending.promise
    }

    const generation = this.generation
    const promise: Promise<CandleSeries> = this.fetch(key, generation).finally(() => {
      if (this.inFlight.get(id)?.promise === promise) {
        this.inFlight.delete(id)
      }
    })

    this.inFlight.set(id, { promise, generation })
    return promise
  }

  /**
   * Returns the live entry for a key without fetching, evicting it if expired
   */
  peek(key: CacheKey): CacheEntry | undefined {
    const id = cacheKeyToString(key)
    const entry = this.entries.get(id)
    if (!entry) {
      return undefined
    }

    if (this.isExpired(entry)) {
      this.entries.delete(id)
      return undefined
    }

    return entry
  }

  /**
   * Removes every entry and detaches in-flight fetches
   * @returns Number of entries removed
   */
  clearAll(): number {
    const removed = this.entries.size
    this.entries.clear()
    this.inFlight.clear()
    this.generation++
    logger.info('Candle cache cleared', { removed })
    return removed
  }

  /**
   * Evicts expired entries
   * @returns Number of entries evicted
   */
  prune(): number {
    let evicted = 0
    for (const [id, entry] of this.entries) {
      if (this.isExpired(entry)) {
        this.entries.delete(id)
        evicted++
      }
    }
    return evicted
  }

  stats(): CandleCacheStats {
    return {
      hits: this.hits,
      misses: this.misses,
      fetches: this.fetches,
      failures: this.failures,
      size: this.entries.size
    }
  }

  private isExpired(entry: CacheEntry): boolean {
    return this.now() - entry.fetchedAt >= this.ttlMs
  }

  private async fetch(key: CacheKey, generation: number): Promise<CandleSeries> {
    this.fetches++

    let candles: Candle[]
    try {
      candles = await this.client.fetchOHLCV(key.symbol, key.interval, key.count)
    } catch (error) {
      this.failures++
      logger.warn('Candle fetch failed', {
        symbol: key.symbol,
        interval: key.interval,
        count: key.count,
        error: error instanceof Error ? error.message : String(error)
      })
      throw error instanceof DataFetchError ? error : new DataFetchError(key.symbol, error)
    }

    const fetchedAt = this.now()
    const value = createCandleSeries(key.symbol, key.interval, candles, fetchedAt)

    if (generation === this.generation) {
      this.entries.set(cacheKeyToString(key), { key, value, fetchedAt })
    } else {
      logger.debug('Discarding fetch that finished after invalidation', { symbol: key.symbol })
    }

    return value
  }
}
