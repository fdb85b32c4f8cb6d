export { BinanceClient } from './binance-client'
export type { BinanceConfig, OhlcvExchange } from './types'
