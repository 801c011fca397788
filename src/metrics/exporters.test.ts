import { describe, it, expect } from 'vitest'
import { exportJson, exportPrometheus } from './exporters.js'
import { createMetricRegistry } from './registry.js'
import { Counter, Histogram } from './descriptor.js'

describe('exportPrometheus', () => {
  it('should match the registry exposition', () => {
    const registry = createMetricRegistry()
    registry.register(new Counter('c', { help: 'C' })).inc()
    expect(exportPrometheus(registry)).toBe('# HELP c C\n# TYPE c counter\nc 1\n')
  })
})

describe('exportJson', () => {
  it('should key families by name with raw label values', () => {
    const registry = createMetricRegistry()
    registry.register(new Counter('jobs_total', { help: 'Jobs', labels: ['queue'] }), ['"mail"']).inc(2)
    registry.register(new Histogram('wait_ms', { buckets: [10] })).observe(4)

    expect(JSON.parse(exportJson(registry))).toEqual({
      metrics: {
        jobs_total: {
          type: 'counter',
          help: 'Jobs',
          values: [{ kind: 'counter', labels: { queue: '"mail"' }, value: 2 }],
        },
        wait_ms: {
          type: 'histogram',
          help: '',
          values: [
            { kind: 'histogram', labels: {}, buckets: [{ le: 10, count: 1 }], sum: 4, count: 1 },
          ],
        },
      },
    })
  })

  it('should export an empty registry', () => {
    expect(JSON.parse(exportJson(createMetricRegistry()))).toEqual({ metrics: {} })
  })
})
