import assert from 'node:assert'
import { describe, it } from 'node:test'
import { InsufficientDataError, InvalidPriceError } from '../../../src/dashboard'
import { computeMetrics } from '../../../src/metrics'
import { createCandleSeries } from '../../../src/models'
import { DAY_MS, makeSeries, START } from '../../helpers/candles'

describe('computeMetrics', () => {
  it('should compute the change between the last two closes', () => {
    const metrics = computeMetrics(makeSeries([100, 110]))

    assert.strictEqual(metrics.currentPrice, 110)
    assert.strictEqual(metrics.changePercent, 10)
  })

  it('should ignore everything before the previous candle', () => {
    const metrics = computeMetrics(makeSeries([1, 100, 105, 95]))

    assert.strictEqual(metrics.currentPrice, 95)
    assert.ok(Math.abs(metrics.changePercent - -9.5238) < 1e-4)
  })

  it('should take high and low from the last candle only', () => {
    const series = createCandleSeries('BTC/USDT', '1d', [
      { timestamp: START, open: 100, high: 150, low: 50, close: 100, volume: 1 },
      { timestamp: START + DAY_MS, open: 100, high: 120, low: 90, close: 110, volume: 1 }
    ], START + 2 * DAY_MS)

    const metrics = computeMetrics(series)

    assert.strictEqual(metrics.dailyHigh, 120)
    assert.strictEqual(metrics.dailyLow, 90)
  })

  it('should report zero change for a flat series', () => {
    assert.strictEqual(computeMetrics(makeSeries([42, 42])).changePercent, 0)
  })

  it('should throw InsufficientDataError for a single candle', () => {
    assert.throws(
      () => computeMetrics(makeSeries([100], 'ETH/USDT')),
      (error: unknown) => {
        assert.ok(error instanceof InsufficientDataError)
        assert.strictEqual(error.symbol, 'ETH/USDT')
        assert.strictEqual(error.count, 1)
        assert.strictEqual(error.message, 'Not enough candles for ETH/USDT: need at least 2, got 1')
        return true
      }
    )
  })

  it('should throw InsufficientDataError for an empty series', () => {
    assert.throws(() => computeMetrics(makeSeries([])), InsufficientDataError)
  })

  it('should throw InvalidPriceError for a zero reference close', () => {
    assert.throws(
      () => computeMetrics(makeSeries([0, 5])),
      (error: unknown) => {
        assert.ok(error instanceof InvalidPriceError)
        assert.strictEqual(error.price, 0)
        assert.strictEqual(error.message, 'Invalid reference price for BTC/USDT: 0')
        return true
      }
    )
  })

  it('should throw InvalidPriceError for a negative reference close', () => {
    assert.throws(() => computeMetrics(makeSeries([-1, 5])), InvalidPriceError)
  })

  it('should throw InvalidPriceError for a non-finite reference close', () => {
    assert.throws(() => computeMetrics(makeSeries([Number.NaN, 5])), InvalidPriceError)
    assert.throws(
      () => computeMetrics(makeSeries([Number.POSITIVE_INFINITY, 5])),
      /Invalid reference price for BTC\/USDT: Infinity/
    )
  })
})
