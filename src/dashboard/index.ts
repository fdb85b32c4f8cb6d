export { DASHBOARD_INTERVAL, DashboardContext } from './dashboard-context'
export type {
  DashboardContextOptions,
  DashboardSnapshot,
  DashboardWarning,
  MetricPanel
} from './dashboard-context'
export {
  DashboardError,
  DataFetchError,
  InsufficientDataError,
  InvalidPriceError,
  MalformedCandleError,
  UnknownSymbolError,
  UnsupportedWindowError
} from './errors'
