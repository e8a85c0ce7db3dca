/**
 * Error Classification and Structured Error Handling
 *
 * Provides consistent error categorization for logging and for the cycle
 * driver's fatal / non-fatal decision.
 */

import { ZodError } from 'zod'

/**
 * Error categories for classification
 */
export type ErrorCategory =
  | 'configuration' // Invalid settings; fatal at startup
  | 'fetch' // Upstream failures for a date
  | 'sink' // Export / notification failures for a cycle
  | 'cancelled' // Shutdown signal
  | 'timeout' // Operation timeout
  | 'external' // Network failures outside a fetch outcome
  | 'internal' // Bugs

/**
 * Known error codes by category
 */
export const ERROR_CODES = {
  // Configuration
  CONFIG_NOT_FOUND: 'CONFIG_NOT_FOUND',
  CONFIG_INVALID_JSON: 'CONFIG_INVALID_JSON',
  CONFIG_VALIDATION_FAILED: 'CONFIG_VALIDATION_FAILED',
  INVALID_DATE: 'INVALID_DATE',
  INVALID_DATE_RANGE: 'INVALID_DATE_RANGE',

  // Sink
  SINK_DELIVERY_FAILED: 'SINK_DELIVERY_FAILED',
  SINK_AUTH_FAILED: 'SINK_AUTH_FAILED',
  SINK_WRITE_FAILED: 'SINK_WRITE_FAILED',

  // Runtime
  CANCELLED: 'CANCELLED',
  OPERATION_TIMEOUT: 'OPERATION_TIMEOUT',
  NETWORK_ERROR: 'NETWORK_ERROR',
  UNEXPECTED_ERROR: 'UNEXPECTED_ERROR',
} as const

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES]

/**
 * Structured error information for logging
 */
export interface ClassifiedError {
  category: ErrorCategory
  code: ErrorCode
  message: string
  fatal: boolean
  details?: Record<string, unknown>
  originalError?: Error
}

export class PollerError extends Error {
  readonly category: ErrorCategory
  readonly code: ErrorCode
  readonly fatal: boolean
  readonly details?: Record<string, unknown>

  constructor(
    category: ErrorCategory,
    code: ErrorCode,
    message: string,
    options: { fatal?: boolean; details?: Record<string, unknown>; cause?: unknown } = {}
  ) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined)
    this.name = 'PollerError'
    this.category = category
    this.code = code
    this.fatal = options.fatal ?? false
    this.details = options.details
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      category: this.category,
      code: this.code,
      message: this.message,
      fatal: this.fatal,
      details: this.details,
    }
  }
}

/**
 * Invalid configuration. Always fatal; raised before any fetch begins.
 */
export class ConfigurationError extends PollerError {
  constructor(code: ErrorCode, message: string, details?: Record<string, unknown>) {
    super('configuration', code, message, { fatal: true, details })
    this.name = 'ConfigurationError'
  }
}

/**
 * A sink could not deliver a cycle's result.
 */
export class SinkError extends PollerError {
  readonly sink: string

  constructor(
    sink: string,
    code: ErrorCode,
    message: string,
    options: { fatal?: boolean; details?: Record<string, unknown>; cause?: unknown } = {}
  ) {
    super('sink', code, message, { ...options, details: { sink, ...options.details } })
    this.name = 'SinkError'
    this.sink = sink
  }
}

/** Node network error codes treated as transient */
const NETWORK_ERROR_CODES = [
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'ETIMEDOUT',
  'EPIPE',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'EAI_AGAIN',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_SOCKET',
]

/**
 * Classify an error into a structured format
 */
export function classifyError(error: unknown): ClassifiedError {
  if (error instanceof PollerError) {
    return {
      category: error.category,
      code: error.code,
      message: error.message,
      fatal: error.fatal,
      details: error.details,
      originalError: error,
    }
  }

  if (error instanceof ZodError) {
    return {
      category: 'configuration',
      code: ERROR_CODES.CONFIG_VALIDATION_FAILED,
      message: 'Validation failed',
      fatal: true,
      details: { issues: formatZodIssues(error) },
      originalError: error,
    }
  }

  if (error instanceof Error) {
    if (error.name === 'AbortError') {
      return {
        category: 'cancelled',
        code: ERROR_CODES.CANCELLED,
        message: error.message,
        fatal: false,
        originalError: error,
      }
    }

    if (error.name === 'TimeoutError') {
      return {
        category: 'timeout',
        code: ERROR_CODES.OPERATION_TIMEOUT,
        message: error.message,
        fatal: false,
        originalError: error,
      }
    }

    const networkCode = findNetworkCode(error)
    if (networkCode) {
      return {
        category: 'external',
        code: ERROR_CODES.NETWORK_ERROR,
        message: `Network error: ${networkCode}`,
        fatal: false,
        details: { errorCode: networkCode },
        originalError: error,
      }
    }

    return {
      category: 'internal',
      code: ERROR_CODES.UNEXPECTED_ERROR,
      message: error.message || 'An unexpected error occurred',
      fatal: false,
      originalError: error,
    }
  }

  // Non-Error thrown values
  return {
    category: 'internal',
    code: ERROR_CODES.UNEXPECTED_ERROR,
    message: String(error),
    fatal: false,
  }
}

export function formatZodIssues(error: ZodError): Array<{ path: string; message: string }> {
  return error.issues.map(issue => ({
    path: issue.path.join('.'),
    message: issue.message,
  }))
}

/**
 * Extract a Node network error code from an error or its cause chain.
 * Native fetch wraps socket errors as `TypeError('fetch failed', { cause })`.
 */
export function findNetworkCode(error: unknown, depth = 0): string | null {
  if (!(error instanceof Error) || depth > 3) {
    return null
  }
  if ('code' in error && typeof error.code === 'string' && NETWORK_ERROR_CODES.includes(error.code)) {
    return error.code
  }
  return findNetworkCode(error.cause, depth + 1)
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
