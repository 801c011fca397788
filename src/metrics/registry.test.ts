import { describe, it, expect, beforeEach } from 'vitest'
import pino from 'pino'
import { MetricRegistry, createMetricRegistry, getRegistry, register } from './registry.js'
import { Counter, Gauge, Histogram } from './descriptor.js'
import { MetricsError } from '../errors/index.js'

function codeOf(fn: () => unknown): string | undefined {
  try {
    fn()
  } catch (err) {
    if (err instanceof MetricsError) return err.code
    throw err
  }
  return undefined
}

describe('MetricRegistry', () => {
  let registry: MetricRegistry

  beforeEach(() => {
    registry = createMetricRegistry()
  })

  describe('register', () => {
    it('should return a live cell for the series', () => {
      const cell = registry.register(new Counter('c', { help: 'Count' }))
      cell.inc(3)
      expect(registry.metrics()).toBe('# HELP c Count\n# TYPE c counter\nc 3\n')
    })

    it('should accept more label sets for the same family', () => {
      const requests = new Counter('requests_total', { labels: ['code'] })
      registry.register(requests, ['200']).inc(2)
      registry.register(requests, ['500']).inc()
      expect(registry.metrics()).toBe(
        [
          '# HELP requests_total ',
          '# TYPE requests_total counter',
          'requests_total{code="200"} 2',
          'requests_total{code="500"} 1',
          '',
        ].join('\n')
      )
    })

    it('should reject a family name reused with another kind', () => {
      registry.register(new Counter('jobs', { labels: ['q'] }), ['a'])
      expect(codeOf(() => registry.register(new Gauge('jobs', { labels: ['q'] }), ['b']))).toBe(
        'METRIC_KIND_AMBIGUOUS'
      )
      expect(codeOf(() => registry.register(new Histogram('jobs', { buckets: [1] })))).toBe(
        'METRIC_KIND_AMBIGUOUS'
      )
    })

    it('should reject a duplicate label set', () => {
      const counter = new Counter('jobs', { labels: ['q'] })
      registry.register(counter, ['a'])
      expect(codeOf(() => registry.register(counter, ['a']))).toBe('DUPLICATE_SERIES')
    })

    it('should detect duplicates declared in another key order', () => {
      registry.register(new Counter('x', { labels: ['a', 'b'] }), ['1', '2'])
      expect(
        codeOf(() => registry.register(new Counter('x', { labels: ['b', 'a'] }), ['2', '1']))
      ).toBe('DUPLICATE_SERIES')
    })

    it('should reject a label value count mismatch', () => {
      const counter = new Counter('jobs', { labels: ['q', 'priority'] })
      expect(codeOf(() => registry.register(counter, ['a']))).toBe('LABEL_COUNT_MISMATCH')
      expect(codeOf(() => registry.register(counter))).toBe('LABEL_COUNT_MISMATCH')
    })

    it('should leave the registry unchanged after a rejection', () => {
      registry.register(new Gauge('g')).set(1)
      const before = registry.metrics()

      expect(codeOf(() => registry.register(new Counter('g')))).toBe('METRIC_KIND_AMBIGUOUS')
      expect(codeOf(() => registry.register(new Counter('other', { labels: ['a'] })))).toBe(
        'LABEL_COUNT_MISMATCH'
      )

      expect(registry.metrics()).toBe(before)
      expect(registry.familyNames()).toEqual(['g'])
    })
  })

  describe('flush', () => {
    it('should write families in name order and series in registration order', () => {
      const zeta = new Gauge('zeta', { labels: ['k'] })
      registry.register(zeta, ['y']).set(1)
      registry.register(new Counter('alpha')).inc()
      registry.register(zeta, ['x']).set(2)

      expect(registry.metrics()).toBe(
        [
          '# HELP alpha ',
          '# TYPE alpha counter',
          'alpha 1',
          '# HELP zeta ',
          '# TYPE zeta gauge',
          'zeta{k="y"} 1',
          'zeta{k="x"} 2',
          '',
        ].join('\n')
      )
    })

    it('should take help from the first series of a family', () => {
      registry.register(new Counter('c', { help: 'first', labels: ['a'] }), ['1'])
      registry.register(new Counter('c', { help: 'second', labels: ['a'] }), ['2'])
      expect(registry.metrics().split('\n')[0]).toBe('# HELP c first')
    })

    it('should escape help text', () => {
      registry.register(new Counter('c', { help: 'line one\nline two' }))
      expect(registry.metrics().split('\n')[0]).toBe('# HELP c line one\\nline two')
    })

    it('should write nothing for an empty registry', () => {
      expect(registry.metrics()).toBe('')
    })

    it('should propagate sink failures', () => {
      registry.register(new Counter('c'))
      const failure = new Error('sink closed')
      expect(() =>
        registry.flush({
          write() {
            throw failure
          },
        })
      ).toThrow(failure)
    })

    it('should reflect cell updates made after registration', () => {
      const gauge = registry.register(new Gauge('inflight'))
      gauge.inc(5)
      expect(registry.metrics()).toContain('inflight 5\n')
      gauge.dec(5)
      expect(registry.metrics()).toContain('inflight 0\n')
    })
  })

  describe('families', () => {
    it('should snapshot families in flush order', () => {
      registry.register(new Histogram('h', { help: 'H', buckets: [1] })).observe(1)
      registry.register(new Counter('c', { labels: ['a'] }), ['x']).inc()

      expect(registry.families()).toEqual([
        {
          name: 'c',
          kind: 'counter',
          help: '',
          series: [{ kind: 'counter', labels: { a: 'x' }, value: 1 }],
        },
        {
          name: 'h',
          kind: 'histogram',
          help: 'H',
          series: [
            { kind: 'histogram', labels: {}, buckets: [{ le: 1, count: 1 }], sum: 1, count: 1 },
          ],
        },
      ])
    })
  })

  describe('options', () => {
    it('should log registrations to the supplied logger', () => {
      const lines: string[] = []
      const logger = pino({ level: 'debug' }, { write: (line: string) => lines.push(line) })
      const named = new MetricRegistry({ name: 'orders', logger })

      named.register(new Counter('orders_total'))

      expect(lines).toHaveLength(1)
      const entry: unknown = JSON.parse(lines[0])
      expect(entry).toMatchObject({
        level: 20,
        registry: 'orders',
        metric: 'orders_total',
        kind: 'counter',
        labels: '',
        msg: 'Registered series',
      })
    })

    it('should reject malformed options', () => {
      expect(codeOf(() => new MetricRegistry({ name: '' }))).toBe('INVALID_ARGUMENT')
    })
  })
})

describe('default registry', () => {
  it('should be created once', () => {
    expect(getRegistry()).toBe(getRegistry())
  })

  it('should receive module-level registrations', () => {
    const cell = register(new Counter('default_registry_probe_total', { help: 'probe' }))
    cell.inc(7)
    expect(getRegistry().metrics()).toContain(
      '# HELP default_registry_probe_total probe\n# TYPE default_registry_probe_total counter\ndefault_registry_probe_total 7\n'
    )
  })
})
