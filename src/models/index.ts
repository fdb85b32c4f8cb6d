export {
  CANDLE_INTERVALS,
  createCandleSeries,
  formatCandle,
  normalizeCandles
} from './candle.dto'
export type { Candle, CandleInterval, CandleSeries } from './candle.dto'
export type { FormattedMetrics, Metrics } from './metrics.dto'
export type {
  ChartLayout,
  ChartPoint,
  RenderableChart,
  RenderableSeries,
  SymbolStyle
} from './chart-series.dto'
