/**
 * Configuration
 *
 * Environment-driven settings for the ambient logger, and the options an
 * explicitly constructed registry accepts.
 */

import { z } from 'zod'
import type { Logger } from 'pino'
import { Errors } from '../errors/index.js'

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const

export type LogLevel = (typeof LOG_LEVELS)[number]

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((v) => v === 'true' || v === '1')

const envSchema = z.object({
  NODE_ENV: z.string().optional(),
  LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
  LOG_PRETTY: booleanFlag.optional(),
})

/**
 * Resolved configuration
 */
export interface PromlineConfig {
  /** pino level for the base logger */
  logLevel: LogLevel
  /** Pipe logs through pino-pretty */
  pretty: boolean
}

/**
 * Load configuration from environment variables
 *
 * - `LOG_LEVEL`: pino level (default `info`, `silent` under `NODE_ENV=test`)
 * - `LOG_PRETTY`: `true`/`false` (default: true only in `development`)
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): PromlineConfig {
  const parsed = envSchema.safeParse(env)
  if (!parsed.success) {
    throw Errors.fromZod('environment', parsed.error)
  }

  const { NODE_ENV, LOG_LEVEL, LOG_PRETTY } = parsed.data
  return {
    logLevel: LOG_LEVEL ?? (NODE_ENV === 'test' ? 'silent' : 'info'),
    pretty: LOG_PRETTY ?? NODE_ENV === 'development',
  }
}

const registryOptionsSchema = z.object({
  name: z.string().min(1).optional(),
  logger: z.custom<Logger>(
    (value) => typeof value === 'object' && value !== null && 'child' in value && 'debug' in value,
    { message: 'Expected a pino logger' }
  ).optional(),
})

/**
 * Options for an explicitly constructed registry
 */
export type RegistryOptions = z.input<typeof registryOptionsSchema>

/**
 * Validate registry options
 */
export function parseRegistryOptions(options: RegistryOptions = {}): RegistryOptions {
  const parsed = registryOptionsSchema.safeParse(options)
  if (!parsed.success) {
    throw Errors.fromZod('registry options', parsed.error)
  }
  return parsed.data
}
