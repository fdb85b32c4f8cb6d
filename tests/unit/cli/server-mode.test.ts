import { deepStrictEqual, ok, strictEqual } from 'node:assert'
import { beforeEach, describe, it } from 'node:test'
import { ConfigValidator } from '../../../src/cli/config-validator'
import { ServerMode } from '../../../src/cli/server-mode'
import { DashboardContext } from '../../../src/dashboard'
import { makeCandles, ManualClock } from '../../helpers/candles'
import { FakeMarketDataClient } from '../../helpers/fake-market-data-client'

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null
}

describe('Server Mode', () => {
  let client: FakeMarketDataClient
  let context: DashboardContext
  let server: ServerMode

  beforeEach(() => {
    client = new FakeMarketDataClient()
      .respond('BTC/USDT', makeCandles([40000, 41000]))
      .respond('ETH/USDT', makeCandles([2000, 2100]))
      .respond('SOL/USDT', makeCandles([100, 90]))
    context = new DashboardContext(ConfigValidator.defaults(), client, { now: new ManualClock().now })
    server = new ServerMode(context)
  })

  it('should report health with cache statistics', async () => {
    const response = await server.dispatch('GET', '/health')

    strictEqual(response.status, 200)
    ok(isRecord(response.body))
    strictEqual(response.body.status, 'ok')
    deepStrictEqual(response.body.cache, { hits: 0, misses: 0, fetches: 0, failures: 0, size: 0 })
  })

  it('should list the configured symbols', async () => {
    const response = await server.dispatch('GET', '/symbols')

    strictEqual(response.status, 200)
    deepStrictEqual(response.body, { symbols: context.symbols })
  })

  it('should serve a snapshot for the requested window', async () => {
    const response = await server.dispatch('GET', '/dashboard?days=7')

    strictEqual(response.status, 200)
    deepStrictEqual(response.body, await context.loadSnapshot(7))
    ok(client.calls.every((call) => call.limit === 7))
  })

  it('should fall back to the configured window', async () => {
    const response = await server.dispatch('GET', '/dashboard')

    ok(isRecord(response.body))
    strictEqual(response.body.days, 30)
  })

  it('should reject an unsupported window', async () => {
    deepStrictEqual(await server.dispatch('GET', '/dashboard?days=14'), {
      status: 400,
      body: { error: 'days must be one of: 7, 30, 90' }
    })
    deepStrictEqual((await server.dispatch('GET', '/dashboard?days=abc')).status, 400)
  })

  it('should clear the cache on refresh', async () => {
    await server.dispatch('GET', '/dashboard?days=7')

    deepStrictEqual(await server.dispatch('POST', '/refresh'), { status: 200, body: { cleared: 3 } })
    strictEqual(context.cache.stats().size, 0)
  })

  it('should answer unknown routes with 404', async () => {
    deepStrictEqual(await server.dispatch('GET', '/nope'), { status: 404, body: { error: 'Not found' } })
    strictEqual((await server.dispatch('GET', '/refresh')).status, 404)
  })

  it('should map dashboard errors to 400', async () => {
    await context.close()

    deepStrictEqual(await server.dispatch('GET', '/dashboard?days=7'), {
      status: 400,
      body: { error: 'Dashboard context is closed' }
    })
  })
})
