export { BinanceClient } from './binance'
export type { BinanceConfig, OhlcvExchange } from './binance'
