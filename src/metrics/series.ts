/**
 * Series
 *
 * One concrete label-value assignment of a metric family, backed by one
 * live cell. The label string is rendered once, at registration, and is
 * both the series' identity within its family and the text reused on every
 * flush.
 */

import { Errors } from '../errors/index.js'
import { CounterCell, GaugeCell, HistogramCell } from './cells.js'
import type { Cell } from './cells.js'
import type { Counter, Gauge, Histogram, MetricTemplate } from './descriptor.js'
import type { ExpositionSink, SeriesSnapshot } from './types.js'
import { BUCKET_LABEL } from './types.js'

/**
 * Escape a label value: backslash, double quote and line feed
 */
export function escapeLabelValue(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"').replace(/\n/g, '\\n')
}

/**
 * Escape HELP text: backslash and line feed
 */
export function escapeHelp(help: string): string {
  return help.replace(/\\/g, '\\\\').replace(/\n/g, '\\n')
}

/**
 * Format a sample value the way the exposition format spells it
 */
export function formatValue(value: number): string {
  if (Number.isNaN(value)) return 'NaN'
  if (value === Infinity) return '+Inf'
  if (value === -Infinity) return '-Inf'
  return String(value)
}

/**
 * Render `k="v"` pairs in canonical key order
 *
 * `values` follow the caller's declaration order; each canonical key knows
 * which position to read.
 */
export function renderLabels(descriptor: MetricTemplate, values: readonly string[]): string {
  if (values.length !== descriptor.labelKeys.length) {
    throw Errors.labelCountMismatch(descriptor.name, descriptor.labelKeys.length, values.length)
  }
  return descriptor.labelKeys
    .map(({ key, index }) => `${key}="${escapeLabelValue(values[index])}"`)
    .join(',')
}

export function createCell(descriptor: Counter): CounterCell
export function createCell(descriptor: Gauge): GaugeCell
export function createCell(descriptor: Histogram): HistogramCell
export function createCell(descriptor: MetricTemplate): Cell
export function createCell(descriptor: MetricTemplate): Cell {
  switch (descriptor.kind) {
    case 'counter':
      return new CounterCell()
    case 'gauge':
      return new GaugeCell()
    case 'histogram':
      return new HistogramCell(descriptor.bounds)
  }
}

export class Series {
  /** Rendered label pairs, without braces; empty when unlabeled */
  readonly labels: string
  readonly cell: Cell
  private readonly labelValues: readonly string[]

  constructor(
    readonly descriptor: MetricTemplate,
    labelValues: readonly string[] = []
  ) {
    this.labels = renderLabels(descriptor, labelValues)
    this.labelValues = Object.freeze([...labelValues])
    this.cell = createCell(descriptor)
  }

  get name(): string {
    return this.descriptor.name
  }

  get kind(): MetricTemplate['kind'] {
    return this.descriptor.kind
  }

  /**
   * Write this series' sample lines
   */
  render(sink: ExpositionSink): void {
    const { cell, name } = this

    switch (cell.kind) {
      case 'counter':
      case 'gauge':
        sink.write(`${name}${this.labelBlock()} ${formatValue(cell.value)}\n`)
        return

      case 'histogram': {
        const { buckets, sum, count } = cell.snapshot()
        for (const bucket of buckets) {
          sink.write(
            `${name}_bucket${this.labelBlock(`${BUCKET_LABEL}="${bucket.le}"`)} ${bucket.count}\n`
          )
        }
        sink.write(`${name}_bucket${this.labelBlock(`${BUCKET_LABEL}="+Inf"`)} ${count}\n`)
        sink.write(`${name}_sum${this.labelBlock()} ${formatValue(sum)}\n`)
        sink.write(`${name}_count${this.labelBlock()} ${count}\n`)
        return
      }
    }
  }

  /**
   * Point-in-time values, with raw (unescaped) labels keyed by name
   */
  snapshot(): SeriesSnapshot {
    const labels: Record<string, string> = {}
    for (const { key, index } of this.descriptor.labelKeys) {
      labels[key] = this.labelValues[index]
    }

    const { cell } = this
    switch (cell.kind) {
      case 'counter':
      case 'gauge':
        return { kind: cell.kind, labels, value: cell.value }
      case 'histogram':
        return { kind: 'histogram', labels, ...cell.snapshot() }
    }
  }

  private labelBlock(extra?: string): string {
    if (this.labels && extra) return `{${this.labels},${extra}}`
    if (this.labels) return `{${this.labels}}`
    if (extra) return `{${extra}}`
    return ''
  }
}
