import assert from 'node:assert'
import { beforeEach, describe, it } from 'node:test'
import { ConfigValidator } from '../../../src/cli/config-validator'
import {
  DashboardContext,
  DashboardError,
  DataFetchError,
  UnknownSymbolError,
  UnsupportedWindowError
} from '../../../src/dashboard'
import { DAY_MS, makeCandles, ManualClock, START } from '../../helpers/candles'
import { FakeMarketDataClient } from '../../helpers/fake-market-data-client'

const BTC_CLOSES = [39000, 39500, 40100, 40800, 41000, 40000, 50000]
const ETH_CLOSES = [2200, 2250, 2300, 2280, 2350, 2400, 2376]
const SOL_CLOSES = [95, 96, 97, 98, 99, 100, 101]

describe('DashboardContext', () => {
  let client: FakeMarketDataClient
  let clock: ManualClock
  let context: DashboardContext

  beforeEach(() => {
    clock = new ManualClock()
    client = new FakeMarketDataClient()
      .respond('BTC/USDT', makeCandles(BTC_CLOSES))
      .respond('ETH/USDT', makeCandles(ETH_CLOSES))
      .respond('SOL/USDT', makeCandles(SOL_CLOSES))
    context = new DashboardContext(ConfigValidator.defaults(), client, { now: clock.now })
  })

  describe('getCandles', () => {
    it('should fetch daily candles for the window', async () => {
      const series = await context.getCandles('BTC/USDT', 7)

      assert.strictEqual(series.candles.length, 7)
      assert.deepStrictEqual(client.calls, [{ symbol: 'BTC/USDT', interval: '1d', limit: 7 }])
    })

    it('should reject symbols outside the registry', async () => {
      await assert.rejects(() => context.getCandles('DOGE/USDT', 7), UnknownSymbolError)
      assert.strictEqual(client.calls.length, 0)
    })

    it('should reject unsupported windows', async () => {
      await assert.rejects(
        () => context.getCandles('BTC/USDT', 14),
        (error: unknown) => error instanceof UnsupportedWindowError && error.days === 14
      )
    })

    it('should feed metrics from the fetched candles', async () => {
      client.respond('BTC/USDT', [
        { timestamp: START, open: 98, high: 101, low: 97, close: 100, volume: 5 },
        { timestamp: START + DAY_MS, open: 100, high: 107, low: 99, close: 105, volume: 5 },
        { timestamp: START + 2 * DAY_MS, open: 105, high: 106, low: 94, close: 95, volume: 5 }
      ])

      const metrics = context.getMetrics(await context.getCandles('BTC/USDT', 7))

      assert.strictEqual(metrics.currentPrice, 95)
      assert.ok(Math.abs(metrics.changePercent - -9.5238) < 1e-4)
      assert.strictEqual(metrics.dailyHigh, 106)
      assert.strictEqual(metrics.dailyLow, 94)
    })

    it('should surface fetch failures as DataFetchError', async () => {
      client.respond('BTC/USDT', new Error('rate limited'))
      await assert.rejects(() => context.getCandles('BTC/USDT', 7), DataFetchError)
    })
  })

  describe('loadSnapshot', () => {
    it('should build a chart trace and a metric panel for every symbol', async () => {
      const snapshot = await context.loadSnapshot(7)

      assert.strictEqual(snapshot.days, 7)
      assert.strictEqual(snapshot.generatedAt, clock.current)
      assert.deepStrictEqual(snapshot.chart.series.map((s) => s.name), ['BTC', 'ETH', 'SOL'])
      assert.deepStrictEqual(snapshot.panels.map((p) => p.slot), [0, 1, 2])
      assert.deepStrictEqual(snapshot.warnings, [])
    })

    it('should format metrics for the panels', async () => {
      const snapshot = await context.loadSnapshot(7)
      const [btc, eth, sol] = snapshot.panels

      assert.strictEqual(btc?.displayName, 'Bitcoin')
      assert.strictEqual(btc?.metrics?.currentPrice, 50000)
      assert.strictEqual(btc?.metrics?.changePercent, 25)
      assert.strictEqual(btc?.display?.price, '$50,000.00')
      assert.strictEqual(btc?.display?.change, '+25.00%')
      assert.strictEqual(eth?.display?.change, '-1.00%')
      assert.strictEqual(sol?.display?.price, '$101.0000')
    })

    it('should use the configured default window', async () => {
      const snapshot = await context.loadSnapshot()

      assert.strictEqual(snapshot.days, 30)
      assert.ok(client.calls.every((call) => call.limit === 30))
    })

    it('should keep rendering the other symbols when one fetch fails', async () => {
      client.respond('ETH/USDT', new Error('rate limited'))

      const snapshot = await context.loadSnapshot(7)

      assert.deepStrictEqual(snapshot.chart.series.map((s) => s.symbol), ['BTC/USDT', 'SOL/USDT'])
      assert.deepStrictEqual(snapshot.panels.map((p) => p.symbol), ['BTC/USDT', 'SOL/USDT'])
      assert.deepStrictEqual(snapshot.warnings, [
        { symbol: 'ETH/USDT', kind: 'fetch', message: 'Error fetching data for ETH/USDT: rate limited' }
      ])
    })

    it('should keep the trace but omit metrics for a single-candle series', async () => {
      client.respond('SOL/USDT', makeCandles([100]))

      const snapshot = await context.loadSnapshot(7)
      const sol = snapshot.panels.find((panel) => panel.symbol === 'SOL/USDT')

      assert.strictEqual(snapshot.chart.series.length, 3)
      assert.ok(sol)
      assert.strictEqual(sol.metrics, undefined)
      assert.strictEqual(sol.display, undefined)
      assert.deepStrictEqual(snapshot.warnings, [
        { symbol: 'SOL/USDT', kind: 'metrics', message: 'Not enough candles for SOL/USDT: need at least 2, got 1' }
      ])
    })

    it('should keep the trace but omit metrics when the reference close is zero', async () => {
      client.respond('ETH/USDT', makeCandles([0, 5]))

      const snapshot = await context.loadSnapshot(7)
      const eth = snapshot.panels.find((panel) => panel.symbol === 'ETH/USDT')

      assert.ok(eth)
      assert.strictEqual(eth.metrics, undefined)
      assert.strictEqual(eth.display, undefined)
      assert.deepStrictEqual(snapshot.chart.series.map((s) => s.symbol), ['BTC/USDT', 'ETH/USDT', 'SOL/USDT'])
      assert.deepStrictEqual(snapshot.warnings, [
        { symbol: 'ETH/USDT', kind: 'metrics', message: 'Invalid reference price for ETH/USDT: 0' }
      ])
    })

    it('should reject unsupported windows', async () => {
      await assert.rejects(() => context.loadSnapshot(14), UnsupportedWindowError)
    })

    it('should serve repeat loads from the cache', async () => {
      await context.loadSnapshot(7)
      await context.loadSnapshot(7)

      assert.strictEqual(client.calls.length, 3)
    })
  })

  describe('invalidateAll', () => {
    it('should force the next load to refetch', async () => {
      await context.loadSnapshot(7)

      assert.strictEqual(context.invalidateAll(), 3)
      await context.loadSnapshot(7)
      assert.strictEqual(client.calls.length, 6)
    })
  })

  describe('close', () => {
    it('should release the client and refuse further work', async () => {
      await context.loadSnapshot(7)
      await context.close()

      assert.strictEqual(client.closed, true)
      assert.strictEqual(context.isClosed, true)
      assert.strictEqual(context.cache.stats().size, 0)
      await assert.rejects(() => context.loadSnapshot(7), DashboardError)
      assert.throws(() => context.invalidateAll(), /Dashboard context is closed/)
    })

    it('should be safe to call twice', async () => {
      await context.close()
      await context.close()
      assert.strictEqual(context.isClosed, true)
    })
  })
})
