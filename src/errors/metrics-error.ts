import type { ErrorCode } from './codes.js'

/**
 * Error raised by metric declaration, bucket construction and registration
 */
export class MetricsError extends Error {
  constructor(
    /** String error code (e.g., 'DUPLICATE_SERIES') */
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: unknown
  ) {
    super(message)
    this.name = 'MetricsError'
  }

  /**
   * Convert to plain object for serialization
   */
  toJSON(): { code: ErrorCode; message: string; details?: unknown } {
    return {
      code: this.code,
      message: this.message,
      ...(this.details !== undefined && { details: this.details }),
    }
  }
}

/**
 * Narrow an unknown thrown value to a MetricsError, optionally of one code
 */
export function isMetricsError(err: unknown, code?: ErrorCode): err is MetricsError {
  return err instanceof MetricsError && (code === undefined || err.code === code)
}
