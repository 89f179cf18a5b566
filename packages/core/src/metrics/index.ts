export {
  AxiomMetricsSink,
  JsonlMetricsSink,
  MetricsRecordSchema,
  buildMetricsRecord,
  createCompositeMetricsSink,
  readMetricsLog,
  summarizeMetrics,
  type MetricsRecord,
  type MetricsSummary,
} from './collector'
