/**
 * Metrics System Types
 *
 * Prometheus-style metrics with counters, gauges, and histograms.
 */

/** Metric kinds supported; also the word rendered on the TYPE line */
export type MetricKind = 'counter' | 'gauge' | 'histogram'

/**
 * A label key paired with its position in the caller's declaration order
 */
export interface LabelKey {
  readonly key: string
  readonly index: number
}

/**
 * Anything text can be appended to: a Node Writable, a socket, or the
 * in-memory collector used by `metrics()`.
 *
 * Write failures must be raised synchronously to reach the caller of
 * `flush`.
 */
export interface ExpositionSink {
  write(chunk: string): unknown
}

/** Ordered, strictly increasing histogram upper bounds */
export type BucketSet = readonly number[]

/** Parameters shared by the generated bucket rules */
export interface BucketRuleParams {
  /** First bound */
  start: number
  /** Step (linear) or factor (exponential) */
  delta: number
  /** Number of bounds to generate */
  count: number
}

/** A generated bucket rule */
export type BucketRule =
  | ({ type: 'linear' } & BucketRuleParams)
  | ({ type: 'exponential' } & BucketRuleParams)

/** Histogram bucket declaration: explicit bounds or a rule */
export type BucketSpec = readonly number[] | BucketRule

/** Cumulative count at one upper bound */
export interface HistogramBucket {
  le: number
  count: number
}

/** Point-in-time histogram state */
export interface HistogramSnapshot {
  buckets: HistogramBucket[]
  sum: number
  count: number
}

/** Point-in-time state of one series */
export type SeriesSnapshot =
  | { kind: 'counter' | 'gauge'; labels: Record<string, string>; value: number }
  | ({ kind: 'histogram'; labels: Record<string, string> } & HistogramSnapshot)

/** Point-in-time state of one family */
export interface FamilySnapshot {
  name: string
  kind: MetricKind
  help: string
  series: SeriesSnapshot[]
}

/** Largest bound or observation the integer domain represents exactly */
export const MAX_BOUND = Number.MAX_SAFE_INTEGER

/** Label synthesized on histogram bucket lines */
export const BUCKET_LABEL = 'le'
