/**
 * Error Module
 *
 * Error factories, the error class and error code definitions.
 */

export { Errors } from './factories.js'
export type { ArgumentIssue } from './factories.js'

export {
  ErrorCodes,
  type ErrorCode,
  type ErrorCodeDef,
  isErrorCode,
  getErrorCategory,
} from './codes.js'

export { MetricsError, isMetricsError } from './metrics-error.js'
