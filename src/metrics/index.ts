/**
 * Metrics System
 *
 * Prometheus-style metrics with counters, gauges, and histograms.
 */

export { Counter, Gauge, Histogram, MetricDescriptor, canonicalLabelKeys } from './descriptor.js'
export type { MetricOptions, HistogramOptions, MetricTemplate } from './descriptor.js'

export { explicitBuckets, linearBuckets, exponentialBuckets, buildBuckets } from './buckets.js'

export { CounterCell, GaugeCell, HistogramCell } from './cells.js'
export type { Cell } from './cells.js'

export { Series, renderLabels, escapeLabelValue, escapeHelp, formatValue } from './series.js'

export { MetricRegistry, createMetricRegistry, getRegistry, register } from './registry.js'

export { exportPrometheus, exportJson } from './exporters.js'

export type {
  MetricKind,
  LabelKey,
  ExpositionSink,
  BucketSet,
  BucketRule,
  BucketRuleParams,
  BucketSpec,
  HistogramBucket,
  HistogramSnapshot,
  SeriesSnapshot,
  FamilySnapshot,
} from './types.js'

export { MAX_BOUND, BUCKET_LABEL } from './types.js'
