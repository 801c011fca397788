/**
 * Error Codes
 *
 * Central definition of every error the metrics core can raise. All of them
 * describe a programmer or configuration mistake detected at declaration or
 * registration time; none are transient.
 */

/**
 * Error code definition with string identifier and default message
 */
export interface ErrorCodeDef {
  /** String identifier (e.g., 'DUPLICATE_SERIES') */
  code: string
  /** Default message */
  message: string
}

/**
 * All promline error codes
 */
export const ErrorCodes = {
  // ─────────────────────────────────────────────────────────────
  // Declaration errors
  // ─────────────────────────────────────────────────────────────

  /** Malformed argument (metric name, label key, bucket parameter) */
  INVALID_ARGUMENT: {
    code: 'INVALID_ARGUMENT',
    message: 'Invalid argument',
  },

  /** Two identical label keys in one descriptor */
  DUPLICATE_LABEL_NAME: {
    code: 'DUPLICATE_LABEL_NAME',
    message: 'Duplicate label name',
  },

  /** Histogram declared with the synthesized `le` label */
  RESERVED_LABEL_NAME: {
    code: 'RESERVED_LABEL_NAME',
    message: 'Reserved label name',
  },

  // ─────────────────────────────────────────────────────────────
  // Bucket errors
  // ─────────────────────────────────────────────────────────────

  /** Explicit bounds are not strictly increasing */
  UNORDERED_BUCKETS: {
    code: 'UNORDERED_BUCKETS',
    message: 'Buckets must be in increasing order',
  },

  /** Linear delta below 1, or exponential delta not above 1 */
  INVALID_DELTA: {
    code: 'INVALID_DELTA',
    message: 'Invalid bucket delta',
  },

  /** Generated bound exceeds the representable range */
  BUCKET_OVERFLOW: {
    code: 'BUCKET_OVERFLOW',
    message: 'Bucket boundaries overflow',
  },

  /**
   * Exponential flooring produced the same bound twice
   *
   * Raise the delta or the start value.
   */
  DUPLICATE_BUCKET: {
    code: 'DUPLICATE_BUCKET',
    message: 'Duplicate bucket',
  },

  // ─────────────────────────────────────────────────────────────
  // Registration errors
  // ─────────────────────────────────────────────────────────────

  /** Label value count differs from label key count */
  LABEL_COUNT_MISMATCH: {
    code: 'LABEL_COUNT_MISMATCH',
    message: 'Label key/value mismatch',
  },

  /** Family name reused with another metric kind */
  METRIC_KIND_AMBIGUOUS: {
    code: 'METRIC_KIND_AMBIGUOUS',
    message: 'Metric type is ambiguous',
  },

  /** Family name reused with an identical label set */
  DUPLICATE_SERIES: {
    code: 'DUPLICATE_SERIES',
    message: 'Duplicate series',
  },
} as const satisfies Record<string, ErrorCodeDef>

/**
 * Error code type (string union)
 */
export type ErrorCode = keyof typeof ErrorCodes

/**
 * Check whether a string is one of the known codes
 */
export function isErrorCode(code: string): code is ErrorCode {
  return Object.prototype.hasOwnProperty.call(ErrorCodes, code)
}

/**
 * Group a code belongs to, for log fields and dashboards
 */
export function getErrorCategory(code: ErrorCode): 'declaration' | 'bucket' | 'registration' {
  switch (code) {
    case 'INVALID_ARGUMENT':
    case 'DUPLICATE_LABEL_NAME':
    case 'RESERVED_LABEL_NAME':
      return 'declaration'

    case 'UNORDERED_BUCKETS':
    case 'INVALID_DELTA':
    case 'BUCKET_OVERFLOW':
    case 'DUPLICATE_BUCKET':
      return 'bucket'

    case 'LABEL_COUNT_MISMATCH':
    case 'METRIC_KIND_AMBIGUOUS':
    case 'DUPLICATE_SERIES':
      return 'registration'
  }
}
