/**
 * Error Factories
 *
 * One builder per error code, so every boundary words its failure the same
 * way.
 *
 * @example
 * ```typescript
 * throw Errors.duplicateSeries('http_requests_total', 'method="GET"')
 * // Creates: { code: 'DUPLICATE_SERIES', message: "Metric 'http_requests_total' has duplicate labels {method=\"GET\"}" }
 * ```
 */

import type { ZodError } from 'zod'
import { MetricsError } from './metrics-error.js'

export interface ArgumentIssue {
  field: string
  message: string
}

/**
 * Convert zod issues to argument issues
 */
function zodIssues(error: ZodError): ArgumentIssue[] {
  return error.issues.map((issue) => ({
    field: issue.path.map(String).join('.') || 'root',
    message: issue.message,
  }))
}

function invalidArgument(subject: string, issues: ArgumentIssue[]): MetricsError {
  const message = issues.map((i) => `${i.field}: ${i.message}`).join('; ')
  return new MetricsError('INVALID_ARGUMENT', `${subject}: ${message}`, { issues })
}

export const Errors = {
  /**
   * Malformed argument
   * @param subject - What was being built (metric name or parameter)
   * @param issues - Field-level problems
   */
  invalidArgument,

  /**
   * Malformed argument rejected by a zod schema
   */
  fromZod(subject: string, error: ZodError): MetricsError {
    return invalidArgument(subject, zodIssues(error))
  },

  duplicateLabelName(metric: string, key: string): MetricsError {
    return new MetricsError(
      'DUPLICATE_LABEL_NAME',
      `Metric '${metric}' has duplicate label names ('${key}')`,
      { metric, key }
    )
  },

  reservedLabelName(metric: string, key: string): MetricsError {
    return new MetricsError(
      'RESERVED_LABEL_NAME',
      `"${key}" is not allowed as label name in histogram '${metric}'`,
      { metric, key }
    )
  },

  /**
   * Explicit bounds not strictly increasing
   * @param index - Position of the first bound not above its predecessor
   */
  unorderedBuckets(metric: string, index: number): MetricsError {
    return new MetricsError(
      'UNORDERED_BUCKETS',
      `Histogram '${metric}' buckets must be in increasing order (index ${index})`,
      { metric, index }
    )
  },

  invalidDelta(metric: string, rule: 'linear' | 'exponential', delta: number): MetricsError {
    const requirement = rule === 'linear' ? 'not less than 1' : 'greater than 1'
    return new MetricsError(
      'INVALID_DELTA',
      `Histogram '${metric}' delta must be ${requirement}, got ${delta}`,
      { metric, rule, delta }
    )
  },

  bucketOverflow(metric: string, produced: number): MetricsError {
    return new MetricsError(
      'BUCKET_OVERFLOW',
      `Histogram '${metric}' boundaries overflow after ${produced} buckets`,
      { metric, produced }
    )
  },

  duplicateBucket(metric: string, bound: number): MetricsError {
    return new MetricsError(
      'DUPLICATE_BUCKET',
      `Histogram '${metric}' got duplicate buckets (${bound}), try to increase the delta`,
      { metric, bound }
    )
  },

  labelCountMismatch(metric: string, expected: number, actual: number): MetricsError {
    return new MetricsError(
      'LABEL_COUNT_MISMATCH',
      `Key/value mismatch for metric '${metric}': expected ${expected} values, got ${actual}`,
      { metric, expected, actual }
    )
  },

  metricKindAmbiguous(metric: string, existing: string, requested: string): MetricsError {
    return new MetricsError(
      'METRIC_KIND_AMBIGUOUS',
      `Metric '${metric}' type is ambiguous (registered as ${existing}, got ${requested})`,
      { metric, existing, requested }
    )
  },

  duplicateSeries(metric: string, labels: string): MetricsError {
    return new MetricsError(
      'DUPLICATE_SERIES',
      `Metric '${metric}' has duplicate labels {${labels}}`,
      { metric, labels }
    )
  },
}
