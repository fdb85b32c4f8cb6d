/**
 * Day windows the dashboard offers
 */
export const DAY_WINDOWS = [7, 30, 90] as const

export type DayWindow = (typeof DAY_WINDOWS)[number]

export function isDayWindow(value: number): value is DayWindow {
  return DAY_WINDOWS.some((window) => window === value)
}

/**
 * Exchange client options
 */
export interface ExchangeConfig {
  /** Let the client library throttle requests to the exchange's limits */
  enableRateLimit: boolean
  /** Request timeout enforced by the client, in milliseconds */
  timeoutMs: number
}

export interface CacheConfig {
  /** How long fetched candles stay fresh, in seconds */
  ttlSeconds: number
}

/**
 * HTTP server options for server mode
 */
export interface ServerConfig {
  /** Host to bind to */
  host: string
  /** Port to listen on */
  port: number
  /** Enable CORS */
  cors: boolean
}

/**
 * Complete dashboard configuration
 */
export interface DashboardConfig {
  exchange: ExchangeConfig
  cache: CacheConfig
  /** Window shown when none is selected */
  defaultDays: DayWindow
  server: ServerConfig
  /** Re-render period for watch mode, in seconds */
  refreshSeconds: number
}
