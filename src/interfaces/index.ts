export { DAY_WINDOWS, isDayWindow } from './dashboard-config.interface'
export type {
  CacheConfig,
  DashboardConfig,
  DayWindow,
  ExchangeConfig,
  ServerConfig
} from './dashboard-config.interface'
export type { MarketDataClient } from './market-data-client.interface'
