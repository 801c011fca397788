/**
 * Logger Utility
 *
 * pino logger configured from the environment, with pretty-print on demand.
 */

import pino from 'pino'
import { loadConfig } from '../config/index.js'

const config = loadConfig()

/**
 * Base logger instance
 */
const baseLogger = pino({
  level: config.logLevel,
  transport: config.pretty
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      }
    : undefined,
})

/**
 * Create a child logger with a component name
 */
export function createLogger(component: string): pino.Logger {
  return baseLogger.child({ component })
}

/**
 * Get the base logger
 */
export function getLogger(): pino.Logger {
  return baseLogger
}
