/**
 * promline - In-process metrics with Prometheus text exposition
 *
 * Declare once, register per label set, drive the cell, flush on scrape.
 */

// === Metrics ===
export {
  Counter,
  Gauge,
  Histogram,
  MetricDescriptor,
  canonicalLabelKeys,
  explicitBuckets,
  linearBuckets,
  exponentialBuckets,
  buildBuckets,
  CounterCell,
  GaugeCell,
  HistogramCell,
  Series,
  renderLabels,
  escapeLabelValue,
  escapeHelp,
  formatValue,
  MetricRegistry,
  createMetricRegistry,
  getRegistry,
  register,
  exportPrometheus,
  exportJson,
  MAX_BOUND,
  BUCKET_LABEL,
} from './metrics/index.js'
export type {
  MetricOptions,
  HistogramOptions,
  MetricTemplate,
  Cell,
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
} from './metrics/index.js'

// === Errors ===
export {
  Errors,
  ErrorCodes,
  MetricsError,
  isMetricsError,
  isErrorCode,
  getErrorCategory,
} from './errors/index.js'
export type { ErrorCode, ErrorCodeDef, ArgumentIssue } from './errors/index.js'

// === Config ===
export { loadConfig, parseRegistryOptions } from './config/index.js'
export type { PromlineConfig, RegistryOptions, LogLevel } from './config/index.js'

// === Utils ===
export { createLogger, getLogger } from './utils/index.js'
