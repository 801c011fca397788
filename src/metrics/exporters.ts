/**
 * Metric Exporters
 *
 * Export a registry to Prometheus text format or JSON.
 */

import type { MetricRegistry } from './registry.js'

/**
 * Export metrics to Prometheus text format
 *
 * Format:
 * # HELP metric_name Description
 * # TYPE metric_name type
 * metric_name{label="value"} 123
 */
export function exportPrometheus(registry: MetricRegistry): string {
  return registry.metrics()
}

/**
 * Export metrics to JSON format
 *
 * Families keyed by name; label values are raw, not escaped.
 */
export function exportJson(registry: MetricRegistry): string {
  const metrics: Record<string, unknown> = {}

  for (const family of registry.families()) {
    metrics[family.name] = {
      type: family.kind,
      help: family.help,
      values: family.series,
    }
  }

  return JSON.stringify({ metrics }, null, 2)
}
