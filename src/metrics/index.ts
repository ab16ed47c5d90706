export type { TraversalMetrics, MetricData, MetricEvent } from './types.js'
export {
  METRICS_FILE_NAME,
  createMetricEvent,
  emitMetric,
  appendMetricsFile,
  createMetricsSink,
} from './sink.js'
export type { MetricsSink } from './sink.js'
