export { computeMetrics } from './metrics-computer'
export { formatChangePercent, formatMetrics, formatPrice } from './price-format'
