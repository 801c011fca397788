import { describe, it, expect } from 'vitest'
import pino from 'pino'
import { loadConfig, parseRegistryOptions } from './index.js'
import { MetricsError } from '../errors/index.js'

describe('loadConfig', () => {
  it('should default to info without pretty-print', () => {
    expect(loadConfig({})).toEqual({ logLevel: 'info', pretty: false })
  })

  it('should silence logs under test', () => {
    expect(loadConfig({ NODE_ENV: 'test' })).toEqual({ logLevel: 'silent', pretty: false })
  })

  it('should pretty-print in development', () => {
    expect(loadConfig({ NODE_ENV: 'development' })).toEqual({ logLevel: 'info', pretty: true })
  })

  it('should honour explicit settings', () => {
    expect(loadConfig({ NODE_ENV: 'development', LOG_LEVEL: 'debug', LOG_PRETTY: '0' })).toEqual({
      logLevel: 'debug',
      pretty: false,
    })
    expect(loadConfig({ LOG_PRETTY: 'true' }).pretty).toBe(true)
  })

  it('should reject unknown log levels', () => {
    expect(() => loadConfig({ LOG_LEVEL: 'verbose' })).toThrow(MetricsError)
  })
})

describe('parseRegistryOptions', () => {
  it('should accept a pino logger', () => {
    const logger = pino({ level: 'silent' })
    expect(parseRegistryOptions({ name: 'app', logger })).toEqual({ name: 'app', logger })
  })

  it('should accept no options', () => {
    expect(parseRegistryOptions()).toEqual({})
  })

  it('should reject an empty name', () => {
    expect(() => parseRegistryOptions({ name: '' })).toThrow(/registry options: name:/)
  })
})
