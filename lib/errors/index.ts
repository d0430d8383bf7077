/**
 * Typed Error Hierarchy
 *
 * Search engines and the orchestration layer throw these so callers can tell
 * a rejected query apart from a broken deployment or a flaky upstream source.
 *
 * @example
 * ```ts
 * // Throwing from an engine adapter
 * throw new UpstreamTimeoutError('OpenAlex timed out after 12000ms', 'openalex')
 *
 * // Catching at an API boundary
 * try {
 *   await registry.get(engineId).search(args)
 * } catch (error) {
 *   if (error instanceof AppError) {
 *     return { status: error.statusCode, body: error.toJSON() }
 *   }
 *   throw error
 * }
 * ```
 */

// ============================================================================
// Base Error
// ============================================================================

export interface AppErrorOptions {
  cause?: unknown
}

export class AppError extends Error {
  public readonly code: string
  public readonly statusCode: number
  public readonly isOperational: boolean

  constructor(
    message: string,
    code: string = 'INTERNAL_ERROR',
    statusCode: number = 500,
    isOperational: boolean = true,
    options: AppErrorOptions = {}
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause })
    this.name = this.constructor.name
    this.code = code
    this.statusCode = statusCode
    this.isOperational = isOperational

    // Maintains proper stack trace for where error was thrown
    Error.captureStackTrace(this, this.constructor)
  }

  toJSON() {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      statusCode: this.statusCode,
    }
  }
}

// ============================================================================
// Client Errors (4xx)
// ============================================================================

/**
 * 400 Bad Request - Invalid input from client
 */
export class ValidationError extends AppError {
  public readonly field?: string

  constructor(message: string, code: string = 'VALIDATION_ERROR', field?: string) {
    super(message, code, 400)
    this.field = field
  }
}

/**
 * Search arguments the normalizer refused: conflicting pagination, a page
 * size over the engine maximum, or an unknown field under the `raise` policy.
 */
export class InvalidArgumentsError extends ValidationError {
  constructor(message: string, field?: string) {
    super(message, 'INVALID_ARGUMENTS', field)
  }
}

/**
 * 404 Not Found - Resource doesn't exist
 */
export class NotFoundError extends AppError {
  public readonly resource?: string

  constructor(message: string = 'Resource not found', code: string = 'NOT_FOUND', resource?: string) {
    super(message, code, 404)
    this.resource = resource
  }
}

export class EngineNotFoundError extends NotFoundError {
  public readonly engineId: string

  constructor(engineId: string) {
    super(`No search engine registered with id "${engineId}"`, 'ENGINE_NOT_FOUND', 'engine')
    this.engineId = engineId
  }
}

/**
 * 409 Conflict - Resource already exists or state conflict
 */
export class ConflictError extends AppError {
  constructor(message: string, code: string = 'CONFLICT') {
    super(message, code, 409)
  }
}

/**
 * A multi-engine run was started again before its results were collected.
 */
export class RunInProgressError extends ConflictError {
  constructor(message: string = 'Search run already started; collect its results before starting another') {
    super(message, 'RUN_IN_PROGRESS')
  }
}

// ============================================================================
// Server Errors (5xx)
// ============================================================================

/**
 * Missing or invalid engine configuration. Raised at construction time and
 * never turned into a failed result set: it is a setup bug, not a query failure.
 */
export class ConfigurationError extends AppError {
  public readonly key?: string

  constructor(message: string, key?: string) {
    super(message, 'CONFIGURATION_ERROR', 500, false)
    this.key = key
  }
}

/**
 * 503 Service Unavailable - Dependency failure
 */
export class ServiceUnavailableError extends AppError {
  public readonly service?: string

  constructor(
    message: string = 'Service temporarily unavailable',
    service?: string,
    code: string = 'SERVICE_UNAVAILABLE',
    options: AppErrorOptions = {}
  ) {
    super(message, code, 503, true, options)
    this.service = service
  }
}

// ============================================================================
// Upstream Search Source Errors
// ============================================================================

export interface UpstreamErrorOptions extends AppErrorOptions {
  /** Human-readable detail reported by the source itself */
  info?: string
}

/**
 * Base for failures of an external search source. The search executor
 * contains the subclasses on its allow-list and reports them as failed results.
 */
export class UpstreamError extends ServiceUnavailableError {
  public readonly info?: string

  constructor(message: string, service?: string, code: string = 'UPSTREAM_ERROR', options: UpstreamErrorOptions = {}) {
    super(message, service, code, options)
    this.info = options.info
  }
}

export class UpstreamTimeoutError extends UpstreamError {
  constructor(message: string, service?: string, options: UpstreamErrorOptions = {}) {
    super(message, service, 'UPSTREAM_TIMEOUT', options)
  }
}

/**
 * The source could not be reached at all (DNS, refused connection, reset).
 */
export class UpstreamConnectionError extends UpstreamError {
  constructor(message: string, service?: string, options: UpstreamErrorOptions = {}) {
    super(message, service, 'UPSTREAM_CONNECTION', options)
  }
}

/**
 * The source answered, but not with something we can use.
 */
export class MalformedResponseError extends UpstreamError {
  constructor(
    message: string,
    service?: string,
    options: UpstreamErrorOptions = {},
    code: string = 'MALFORMED_RESPONSE'
  ) {
    super(message, service, code, options)
  }
}

export class HttpStatusError extends MalformedResponseError {
  public readonly status: number

  constructor(message: string, status: number, service?: string, options: UpstreamErrorOptions = {}) {
    super(message, service, options, 'UPSTREAM_HTTP_STATUS')
    this.status = status
  }
}

/**
 * The response body could not be decoded as JSON or XML.
 */
export class DecodeError extends UpstreamError {
  constructor(message: string, service?: string, options: UpstreamErrorOptions = {}) {
    super(message, service, 'DECODE_ERROR', options)
  }
}

// ============================================================================
// Error Utilities
// ============================================================================

/**
 * Type guard to check if error is an AppError
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError
}

/**
 * Type guard to check if error is operational (expected) vs programmer error
 */
export function isOperationalError(error: unknown): boolean {
  if (isAppError(error)) {
    return error.isOperational
  }
  return false
}

/**
 * Message of any thrown value, for logs and failed result sets
 */
export function errorMessage(error: unknown, fallbackMessage: string = 'An error occurred'): string {
  if (error instanceof Error) {
    return error.message
  }
  if (typeof error === 'string' && error.length > 0) {
    return error
  }
  return fallbackMessage
}
