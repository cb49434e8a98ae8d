/**
 * Structured error utilities.
 * HTTP errors use a consistent { error: { code, message, details? } } shape.
 */

export interface ErrorBody {
  error: {
    code: string
    message: string
    details?: Record<string, unknown>
  }
}

export function errorResponse(
  code: string,
  message: string,
  details?: Record<string, unknown>,
): ErrorBody {
  const body: ErrorBody = { error: { code, message } }
  if (details) body.error.details = details
  return body
}

export class AppError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly statusCode: number = 400,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message)
    this.name = 'AppError'
  }

  toJSON(): ErrorBody {
    return errorResponse(this.code, this.message, this.details)
  }
}

export const ErrorCodes = {
  // Generic
  NOT_FOUND: 'not_found',
  INTERNAL_ERROR: 'internal_error',

  // Startup
  INVALID_CONFIG: 'invalid_config',

  // Upstream
  PROVIDER_FAILED: 'provider_failed',
  PROVIDER_RATE_LIMITED: 'provider_rate_limited',
  COLLECTOR_FAILED: 'collector_failed',
  COLLECTOR_BAD_RESPONSE: 'collector_bad_response',

  // Scoring
  SCORE_COMPONENT_FAILED: 'score_component_failed',
} as const

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes]

/** A status provider lookup failed. `rateLimited` is set on HTTP 429. */
export class ProviderError extends AppError {
  constructor(
    public readonly provider: string,
    message: string,
    public readonly rateLimited = false,
  ) {
    super(
      rateLimited ? ErrorCodes.PROVIDER_RATE_LIMITED : ErrorCodes.PROVIDER_FAILED,
      message,
      502,
      { provider },
    )
    this.name = 'ProviderError'
  }
}

/** A collector call failed. `status` is the HTTP status, or undefined for network/timeout. */
export class CollectorError extends AppError {
  constructor(
    message: string,
    public readonly status?: number,
    code: ErrorCode = ErrorCodes.COLLECTOR_FAILED,
  ) {
    super(code, message, 502, status === undefined ? undefined : { status })
    this.name = 'CollectorError'
  }

  /** 4xx other than 429 will not succeed on retry. */
  get retryable(): boolean {
    if (this.status === undefined) return true
    return this.status === 429 || this.status >= 500
  }
}
