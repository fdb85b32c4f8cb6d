import type { FormattedMetrics, Metrics } from '../models'

const CURRENCY_MARKER = '$'

const thousands = new Intl.NumberFormat('en-US', {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
  useGrouping: true
})

/**
 * Formats a price for display.
 * At or above 1000: grouped thousands, 2 decimals ('$1,000.00').
 * Below 1000: 4 decimals, no grouping ('$999.5000').
 */
export function formatPrice(price: number): string {
  if (price >= 1000) {
    return `${CURRENCY_MARKER}${thousands.format(price)}`
  }
  return `${CURRENCY_MARKER}${price.toFixed(4)}`
}

/**
 * Formats a percent change with an explicit sign ('+10.00%', '-9.52%')
 */
export function formatChangePercent(value: number): string {
  const prefix = value >= 0 ? '+' : ''
  return `${prefix}${value.toFixed(2)}%`
}

export function formatMetrics(metrics: Metrics): FormattedMetrics {
  return {
    price: formatPrice(metrics.currentPrice),
    change: formatChangePercent(metrics.changePercent),
    high: formatPrice(metrics.dailyHigh),
    low: formatPrice(metrics.dailyLow)
  }
}
