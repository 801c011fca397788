/**
 * Metric Descriptors
 *
 * Immutable metadata for a metric family. A descriptor is declared once,
 * usually at module load, and can back any number of registrations.
 */

import { z } from 'zod'
import { Errors } from '../errors/index.js'
import { buildBuckets } from './buckets.js'
import type { BucketSet, BucketSpec, LabelKey, MetricKind } from './types.js'
import { BUCKET_LABEL } from './types.js'

const metricNameSchema = z
  .string()
  .regex(/^[a-zA-Z_:][a-zA-Z0-9_:]*$/, 'must match [a-zA-Z_:][a-zA-Z0-9_:]*')

const labelKeySchema = z
  .string()
  .regex(/^[a-zA-Z_][a-zA-Z0-9_]*$/, 'must match [a-zA-Z_][a-zA-Z0-9_]*')

const descriptorSchema = z.object({
  name: metricNameSchema,
  help: z.string(),
  labels: z.array(labelKeySchema),
})

/**
 * Options accepted by every metric template
 */
export interface MetricOptions {
  /** Human-readable description (used in HELP line) */
  help?: string
  /** Label keys, in the order values will be supplied at registration */
  labels?: readonly string[]
}

/**
 * Sort label keys while remembering where each came from
 *
 * The original index lets registration accept values in declaration order
 * and still render them in key order.
 */
export function canonicalLabelKeys(metric: string, keys: readonly string[]): readonly LabelKey[] {
  const sorted = keys
    .map((key, index) => ({ key, index }))
    .sort((a, b) => (a.key < b.key ? -1 : a.key > b.key ? 1 : 0))

  for (let i = 1; i < sorted.length; i++) {
    if (sorted[i - 1].key === sorted[i].key) {
      throw Errors.duplicateLabelName(metric, sorted[i].key)
    }
  }
  return Object.freeze(sorted.map((k) => Object.freeze(k)))
}

/**
 * Common metadata: name, help and canonical label keys
 */
export abstract class MetricDescriptor {
  abstract readonly kind: MetricKind
  readonly name: string
  readonly help: string
  readonly labelKeys: readonly LabelKey[]

  protected constructor(name: string, options: MetricOptions = {}) {
    const parsed = descriptorSchema.safeParse({
      name,
      help: options.help ?? '',
      labels: options.labels ?? [],
    })
    if (!parsed.success) {
      throw Errors.fromZod(`Metric '${name}'`, parsed.error)
    }

    this.name = parsed.data.name
    this.help = parsed.data.help
    this.labelKeys = canonicalLabelKeys(this.name, parsed.data.labels)
  }

  /** Label keys in rendering order */
  get labelNames(): string[] {
    return this.labelKeys.map((k) => k.key)
  }
}

/**
 * Monotonic counter declaration
 *
 * @example
 * ```typescript
 * const requests = new Counter('http_requests_total', {
 *   help: 'Requests served',
 *   labels: ['method', 'code'],
 * })
 * register(requests, ['GET', '200']).inc()
 * ```
 */
export class Counter extends MetricDescriptor {
  readonly kind = 'counter'

  constructor(name: string, options?: MetricOptions) {
    super(name, options)
    Object.freeze(this)
  }
}

/**
 * Gauge declaration
 */
export class Gauge extends MetricDescriptor {
  readonly kind = 'gauge'

  constructor(name: string, options?: MetricOptions) {
    super(name, options)
    Object.freeze(this)
  }
}

/**
 * Options for a histogram declaration
 */
export interface HistogramOptions extends MetricOptions {
  /**
   * Upper bounds: an increasing list, or a linear/exponential rule.
   * Empty means only the `+Inf` bucket.
   */
  buckets: BucketSpec
}

/**
 * Histogram declaration with its resolved bounds
 *
 * `le` cannot be a label key: it is synthesized on every bucket line.
 */
export class Histogram extends MetricDescriptor {
  readonly kind = 'histogram'
  readonly bounds: BucketSet

  constructor(name: string, options: HistogramOptions) {
    super(name, options)
    const reserved = this.labelKeys.find((k) => k.key === BUCKET_LABEL)
    if (reserved) {
      throw Errors.reservedLabelName(this.name, reserved.key)
    }
    this.bounds = buildBuckets(options.buckets, this.name)
    Object.freeze(this)
  }
}

/** Closed set of metric templates */
export type MetricTemplate = Counter | Gauge | Histogram
