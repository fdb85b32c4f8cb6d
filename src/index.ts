export * from './cache'
export * from './chart'
export * from './dashboard'
export * from './interfaces'
export * from './metrics'
export * from './models'
export * from './providers'
export * from './symbols'
export { ConfigLoader, loadDashboardConfig } from './cli/config-loader'
export { ConfigValidator } from './cli/config-validator'
