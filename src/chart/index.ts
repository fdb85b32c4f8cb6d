export {
  DEFAULT_CHART_LAYOUT,
  FILL_OPACITY,
  buildChart,
  buildChartSeries,
  deriveFillColor,
  isHexColor
} from './chart-series-builder'
