/**
 * Bucket Builders
 *
 * Histogram bounds live in the non-negative integer domain so that
 * observation compares and accumulates exactly.
 */

import { z } from 'zod'
import { Errors } from '../errors/index.js'
import type { BucketRuleParams, BucketSet, BucketSpec } from './types.js'
import { MAX_BOUND } from './types.js'

const boundSchema = z.number().int().nonnegative().max(MAX_BOUND)

const ruleSchema = z.object({
  start: boundSchema,
  delta: z.number().finite(),
  count: z.number().int().nonnegative(),
})

function parseRule(metric: string, params: BucketRuleParams): BucketRuleParams {
  const parsed = ruleSchema.safeParse(params)
  if (!parsed.success) {
    throw Errors.fromZod(`Histogram '${metric}' bucket rule`, parsed.error)
  }
  return parsed.data
}

/**
 * Validate caller-supplied bounds
 *
 * Each bound must exceed its predecessor. An empty list is legal and leaves
 * only the implicit `+Inf` bucket.
 */
export function explicitBuckets(bounds: readonly number[], metric = 'unnamed'): BucketSet {
  const parsed = z.array(boundSchema).safeParse(bounds)
  if (!parsed.success) {
    throw Errors.fromZod(`Histogram '${metric}' buckets`, parsed.error)
  }

  const values = parsed.data
  for (let i = 1; i < values.length; i++) {
    if (!(values[i - 1] < values[i])) {
      throw Errors.unorderedBuckets(metric, i)
    }
  }
  return Object.freeze(values)
}

/**
 * `count` bounds spaced by `delta`: start, start+delta, start+2*delta, ...
 */
export function linearBuckets(params: BucketRuleParams, metric = 'unnamed'): BucketSet {
  const { start, delta, count } = parseRule(metric, params)
  if (delta < 1) {
    throw Errors.invalidDelta(metric, 'linear', delta)
  }

  const bounds: number[] = []
  if (count > 0) {
    let le = start
    bounds.push(le)
    for (let i = 1; i < count; i++) {
      if (le > MAX_BOUND - delta) {
        throw Errors.bucketOverflow(metric, bounds.length)
      }
      le = Math.floor(le + delta)
      bounds.push(le)
    }
  }
  return Object.freeze(bounds)
}

/**
 * `count` bounds growing by factor `delta`, each floored to an integer
 */
export function exponentialBuckets(params: BucketRuleParams, metric = 'unnamed'): BucketSet {
  const { start, delta, count } = parseRule(metric, params)
  if (delta <= 1) {
    throw Errors.invalidDelta(metric, 'exponential', delta)
  }

  const bounds: number[] = []
  if (count > 0) {
    let le = start
    bounds.push(le)
    for (let i = 1; i < count; i++) {
      if (le > Math.floor(MAX_BOUND / delta)) {
        throw Errors.bucketOverflow(metric, bounds.length)
      }
      le = Math.floor(le * delta)
      if (le === bounds[bounds.length - 1]) {
        throw Errors.duplicateBucket(metric, le)
      }
      bounds.push(le)
    }
  }
  return Object.freeze(bounds)
}

/**
 * Build bounds from any bucket declaration
 */
export function buildBuckets(spec: BucketSpec, metric = 'unnamed'): BucketSet {
  if (isBoundList(spec)) {
    return explicitBuckets(spec, metric)
  }
  switch (spec.type) {
    case 'linear':
      return linearBuckets(spec, metric)
    case 'exponential':
      return exponentialBuckets(spec, metric)
  }
}

function isBoundList(spec: BucketSpec): spec is readonly number[] {
  return Array.isArray(spec)
}
