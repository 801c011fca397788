/**
 * Metric Registry
 *
 * Owns every registered series, grouped into families by metric name, and
 * renders them as Prometheus text exposition.
 *
 * Calls are synchronous and run to completion, so `flush` always sees each
 * family either before or after a registration, never halfway through one.
 */

import type { Logger } from 'pino'
import { parseRegistryOptions } from '../config/index.js'
import type { RegistryOptions } from '../config/index.js'
import { Errors } from '../errors/index.js'
import { createLogger } from '../utils/logger.js'
import type { CounterCell, GaugeCell, HistogramCell, Cell } from './cells.js'
import type { Counter, Gauge, Histogram, MetricTemplate } from './descriptor.js'
import { Series, escapeHelp } from './series.js'
import type { ExpositionSink, FamilySnapshot, MetricKind } from './types.js'

/**
 * All series sharing one metric name
 *
 * Kind and help come from the first series registered.
 */
interface Family {
  readonly name: string
  readonly kind: MetricKind
  readonly help: string
  /** Registration order */
  readonly series: Series[]
  /** Rendered label strings already taken */
  readonly labelSets: Set<string>
}

/**
 * Sink that collects chunks in memory
 */
class StringSink implements ExpositionSink {
  private readonly chunks: string[] = []

  write(chunk: string): void {
    this.chunks.push(chunk)
  }

  toString(): string {
    return this.chunks.join('')
  }
}

export class MetricRegistry {
  private readonly byName = new Map<string, Family>()
  private readonly logger: Logger

  constructor(options: RegistryOptions = {}) {
    const { name, logger } = parseRegistryOptions(options)
    const base = logger ?? createLogger('metrics')
    this.logger = name ? base.child({ registry: name }) : base
  }

  /**
   * Register one label-value combination of a metric and return its cell
   *
   * `labelValues` follow the order the descriptor's labels were declared in.
   * The returned cell stays owned by the registry; keep it and drive it
   * directly on the hot path.
   */
  register(descriptor: Counter, labelValues?: readonly string[]): CounterCell
  register(descriptor: Gauge, labelValues?: readonly string[]): GaugeCell
  register(descriptor: Histogram, labelValues?: readonly string[]): HistogramCell
  register(descriptor: MetricTemplate, labelValues?: readonly string[]): Cell
  register(descriptor: MetricTemplate, labelValues: readonly string[] = []): Cell {
    const series = new Series(descriptor, labelValues)
    const family = this.byName.get(series.name)

    if (family) {
      if (family.kind !== series.kind) {
        this.logger.debug(
          { metric: series.name, existing: family.kind, requested: series.kind },
          'Rejected registration with conflicting kind'
        )
        throw Errors.metricKindAmbiguous(series.name, family.kind, series.kind)
      }
      if (family.labelSets.has(series.labels)) {
        this.logger.debug(
          { metric: series.name, labels: series.labels },
          'Rejected duplicate series'
        )
        throw Errors.duplicateSeries(series.name, series.labels)
      }
      family.series.push(series)
      family.labelSets.add(series.labels)
    } else {
      this.byName.set(series.name, {
        name: series.name,
        kind: series.kind,
        help: descriptor.help,
        series: [series],
        labelSets: new Set([series.labels]),
      })
    }

    this.logger.debug(
      { metric: series.name, kind: series.kind, labels: series.labels },
      'Registered series'
    )
    return series.cell
  }

  /**
   * Write every family to `sink`: name order, then registration order
   * within a family. Errors thrown by the sink propagate unchanged.
   */
  flush(sink: ExpositionSink): void {
    let written = 0
    for (const name of this.familyNames()) {
      const family = this.byName.get(name)
      if (!family) continue

      sink.write(`# HELP ${family.name} ${escapeHelp(family.help)}\n`)
      sink.write(`# TYPE ${family.name} ${family.kind}\n`)
      for (const series of family.series) {
        series.render(sink)
        written++
      }
    }
    this.logger.trace({ families: this.byName.size, series: written }, 'Flushed metrics')
  }

  /**
   * The current exposition as a string
   */
  metrics(): string {
    const sink = new StringSink()
    this.flush(sink)
    return sink.toString()
  }

  /**
   * Point-in-time copy of every family, in flush order
   */
  families(): FamilySnapshot[] {
    return this.familyNames().flatMap((name) => {
      const family = this.byName.get(name)
      if (!family) return []
      return [
        {
          name: family.name,
          kind: family.kind,
          help: family.help,
          series: family.series.map((s) => s.snapshot()),
        },
      ]
    })
  }

  /** Registered family names, sorted */
  familyNames(): string[] {
    return [...this.byName.keys()].sort()
  }
}

/**
 * Create an independent registry
 */
export function createMetricRegistry(options?: RegistryOptions): MetricRegistry {
  return new MetricRegistry(options)
}

let defaultRegistry: MetricRegistry | undefined

/**
 * The process-wide registry, created on first access
 */
export function getRegistry(): MetricRegistry {
  defaultRegistry ??= new MetricRegistry({ name: 'default' })
  return defaultRegistry
}

/**
 * Register against the process-wide registry
 */
export function register(descriptor: Counter, labelValues?: readonly string[]): CounterCell
export function register(descriptor: Gauge, labelValues?: readonly string[]): GaugeCell
export function register(descriptor: Histogram, labelValues?: readonly string[]): HistogramCell
export function register(descriptor: MetricTemplate, labelValues?: readonly string[]): Cell
export function register(descriptor: MetricTemplate, labelValues?: readonly string[]): Cell {
  return getRegistry().register(descriptor, labelValues)
}
