/**
 * Metric Cells
 *
 * Live values behind registered series. Every mutator is synchronous and
 * runs to completion on the event loop, so concurrent call sites in one
 * process never observe a half-applied update; a histogram's buckets, sum
 * and count always agree with each other.
 */

import { performance } from 'node:perf_hooks'
import type { BucketSet, HistogramSnapshot } from './types.js'

/**
 * Monotonic accumulator
 */
export class CounterCell {
  readonly kind = 'counter'
  private _value = 0

  /** Add `amount` (at least 1) */
  inc(amount = 1): void {
    this._value += amount
  }

  get value(): number {
    return this._value
  }
}

/**
 * Accumulator that moves either way or is set outright
 */
export class GaugeCell {
  readonly kind = 'gauge'
  private _value = 0

  inc(delta = 1): void {
    this._value += delta
  }

  dec(delta = 1): void {
    this._value -= delta
  }

  set(value: number): void {
    this._value = value
  }

  get value(): number {
    return this._value
  }
}

/**
 * Cumulative ("less than or equal") histogram
 *
 * Sum and count are not guarded against exceeding Number.MAX_SAFE_INTEGER;
 * past that point they lose precision.
 */
export class HistogramCell {
  readonly kind = 'histogram'
  readonly bounds: BucketSet
  private readonly counts: number[]
  private _sum = 0
  private _count = 0

  constructor(bounds: BucketSet) {
    this.bounds = bounds
    this.counts = bounds.map(() => 0)
  }

  /**
   * Record one value: it lands in the first bucket whose bound is not less
   * than it and in every bucket after that.
   */
  observe(value: number): void {
    this._sum += value
    this._count += 1
    for (let i = lowerBound(this.bounds, value); i < this.counts.length; i++) {
      this.counts[i] += 1
    }
  }

  /**
   * Start a timer; the returned function observes the elapsed whole
   * milliseconds and returns them.
   */
  startTimer(): () => number {
    const start = performance.now()
    return () => {
      const elapsed = Math.round(performance.now() - start)
      this.observe(elapsed)
      return elapsed
    }
  }

  get sum(): number {
    return this._sum
  }

  get count(): number {
    return this._count
  }

  snapshot(): HistogramSnapshot {
    return {
      buckets: this.bounds.map((le, i) => ({ le, count: this.counts[i] })),
      sum: this._sum,
      count: this._count,
    }
  }
}

/**
 * Index of the first bound not less than `value`
 */
function lowerBound(bounds: BucketSet, value: number): number {
  let lo = 0
  let hi = bounds.length
  while (lo < hi) {
    const mid = (lo + hi) >>> 1
    if (bounds[mid] < value) {
      lo = mid + 1
    } else {
      hi = mid
    }
  }
  return lo
}

/** Closed set of cells */
export type Cell = CounterCell | GaugeCell | HistogramCell
