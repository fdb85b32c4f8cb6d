import { CandleCache } from '../cache'
import { buildChart, buildChartSeries } from '../chart'
import type { DashboardConfig, DayWindow, MarketDataClient } from '../interfaces'
import { isDayWindow } from '../interfaces'
import { computeMetrics, formatMetrics } from '../metrics'
import type {
  CandleInterval,
  CandleSeries,
  FormattedMetrics,
  Metrics,
  RenderableChart,
  RenderableSeries,
  SymbolStyle
} from '../models'
import { BinanceClient } from '../providers'
import { SYMBOL_REGISTRY, getSymbolStyle } from '../symbols'
import logger from '../utils/logger'
import {
  DashboardError,
  DataFetchError,
  InsufficientDataError,
  InvalidPriceError,
  UnsupportedWindowError
} from './errors'

/** Every dashboard request uses daily candles */
export const DASHBOARD_INTERVAL: CandleInterval = '1d'

/**
 * Metrics for one symbol, positioned by its registry slot
 */
export interface MetricPanel {
  symbol: string
  displayName: string
  slot: number
  /** Absent when the series was too short or its reference price unusable */
  metrics?: Metrics
  display?: FormattedMetrics
}

export interface DashboardWarning {
  symbol: string
  kind: 'fetch' | 'metrics'
  message: string
}

/**
 * Everything a presentation shell needs for one render
 */
export interface DashboardSnapshot {
  days: DayWindow
  generatedAt: number
  chart: RenderableChart
  panels: MetricPanel[]
  warnings: DashboardWarning[]
}

export interface DashboardContextOptions {
  /** Clock returning Unix milliseconds, shared with the cache */
  now?: () => number
  registry?: readonly SymbolStyle[]
}

/**
 * Long-lived owner of the candle cache and the market data client.
 * Construct on startup, close on shutdown.
 */
export class DashboardContext {
  readonly cache: CandleCache
  private readonly now: () => number
  private readonly registry: readonly SymbolStyle[]
  private closed = false

  constructor(
    readonly config: DashboardConfig,
    private readonly client: MarketDataClient,
    options: DashboardContextOptions = {}
  ) {
    this.now = options.now ?? Date.now
    this.registry = options.registry ?? SYMBOL_REGISTRY
    this.cache = new CandleCache(client, {
      ttlMs: config.cache.ttlSeconds * 1000,
      now: this.now
    })

    logger.info('Dashboard context created', {
      client: client.name,
      ttlSeconds: config.cache.ttlSeconds,
      symbols: this.registry.map((style) => style.symbol)
    })
  }

  /**
   * Creates a context backed by the Binance client
   */
  static create(config: DashboardConfig, options: DashboardContextOptions = {}): DashboardContext {
    const client = new BinanceClient({
      enableRateLimit: config.exchange.enableRateLimit,
      timeoutMs: config.exchange.timeoutMs
    })
    return new DashboardContext(config, client, options)
  }

  get symbols(): readonly SymbolStyle[] {
    return this.registry
  }

  get isClosed(): boolean {
    return this.closed
  }

  /**
   * Returns daily candles for a symbol over the selected window
   * @throws UnknownSymbolError, UnsupportedWindowError, DataFetchError
   */
  async getCandles(symbol: string, days: number): Promise<CandleSeries> {
    this.assertOpen()
    getSymbolStyle(symbol, this.registry)
    if (!isDayWindow(days)) {
      throw new UnsupportedWindowError(days)
    }

    return this.cache.get({ symbol, interval: DASHBOARD_INTERVAL, count: days })
  }

  /**
   * @throws InsufficientDataError, InvalidPriceError
   */
  getMetrics(series: CandleSeries): Metrics {
    return computeMetrics(series)
  }

  getChartSeries(series: CandleSeries, style: SymbolStyle): RenderableSeries {
    return buildChartSeries(series, style)
  }

  /**
   * Drops every cached series so the next request refetches
   * @returns Number of entries removed
   */
  invalidateAll(): number {
    this.assertOpen()
    return this.cache.clearAll()
  }

  /**
   * Loads every configured symbol in slot order.
   * A failing symbol becomes a warning; the others still render.
   */
  async loadSnapshot(days: number = this.config.defaultDays): Promise<DashboardSnapshot> {
    this.assertOpen()
    if (!isDayWindow(days)) {
      throw new UnsupportedWindowError(days)
    }

    const series: RenderableSeries[] = []
    const panels: MetricPanel[] = []
    const warnings: DashboardWarning[] = []

    for (const style of this.registry) {
      let candles: CandleSeries
      try {
        candles = await this.getCandles(style.symbol, days)
      } catch (error) {
        if (!(error instanceof DataFetchError)) {
          throw error
        }
        warnings.push({ symbol: style.symbol, kind: 'fetch', message: error.message })
        continue
      }

      series.push(this.getChartSeries(candles, style))

      const panel: MetricPanel = {
        symbol: style.symbol,
        displayName: style.displayName,
        slot: style.slot
      }
      try {
        const metrics = this.getMetrics(candles)
        panel.metrics = metrics
        panel.display = formatMetrics(metrics)
      } catch (error) {
        if (!(error instanceof InsufficientDataError || error instanceof InvalidPriceError)) {
          throw error
        }
        logger.warn('Metrics omitted', { symbol: style.symbol, reason: error.message })
        warnings.push({ symbol: style.symbol, kind: 'metrics', message: error.message })
      }
      panels.push(panel)
    }

    return {
      days,
      generatedAt: this.now(),
      chart: buildChart(series),
      panels,
      warnings
    }
  }

  /**
   * Clears the cache and releases the client. Further calls fail.
   */
  async close(): Promise<void> {
    if (this.closed) {
      return
    }
    this.closed = true
    this.cache.clearAll()
    await this.client.close()
    logger.info('Dashboard context closed')
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new DashboardError('Dashboard context is closed')
    }
  }
}
