import logger from './logger';

export type ErrorKind =
  | 'authentication'
  | 'not_found'
  | 'rate_limited'
  | 'validation'
  | 'server_error'
  | 'timeout'
  | 'decode'
  | 'api'
  | 'task_failed'
  | 'cancelled';

export const RETRYABLE_KINDS: ReadonlySet<ErrorKind> = new Set<ErrorKind>([
  'rate_limited',
  'server_error',
  'timeout'
]);

export interface FieldError {
  path: string;
  message: string;
}

export interface KlingErrorOptions {
  statusCode?: number;
  requestId?: string;
  code?: number;
  details?: Record<string, unknown>;
  cause?: unknown;
}

export class KlingError extends Error {
  public readonly kind: ErrorKind;
  public readonly statusCode?: number;
  public readonly requestId?: string;
  public readonly code?: number;
  public readonly details: Record<string, unknown>;
  public readonly cause?: unknown;

  constructor(kind: ErrorKind, message: string, options: KlingErrorOptions = {}) {
    super(message);
    this.name = new.target.name;
    this.kind = kind;
    this.statusCode = options.statusCode;
    this.requestId = options.requestId;
    this.code = options.code;
    this.details = options.details ?? {};
    this.cause = options.cause;

    Error.captureStackTrace(this, new.target);
  }

  get retryable(): boolean {
    return RETRYABLE_KINDS.has(this.kind);
  }
}

export class AuthenticationError extends KlingError {
  constructor(message = 'Authentication failed', options: KlingErrorOptions = {}) {
    super('authentication', message, options);
  }
}

export class NotFoundError extends KlingError {
  constructor(message = 'Resource not found', options: KlingErrorOptions = {}) {
    super('not_found', message, options);
  }
}

export class RateLimitError extends KlingError {
  public readonly retryAfterSeconds: number;

  constructor(retryAfterSeconds: number, options: KlingErrorOptions = {}) {
    super('rate_limited', `Rate limit exceeded, retry after ${retryAfterSeconds}s`, {
      ...options,
      details: { ...options.details, retryAfter: retryAfterSeconds }
    });
    this.retryAfterSeconds = retryAfterSeconds;
  }
}

export class ValidationError extends KlingError {
  public readonly fieldErrors: FieldError[];

  constructor(message: string, fieldErrors: FieldError[] = [], options: KlingErrorOptions = {}) {
    super('validation', message, {
      ...options,
      details: { ...options.details, fieldErrors }
    });
    this.fieldErrors = fieldErrors;
  }
}

export class ServerError extends KlingError {
  constructor(message = 'Upstream server error', options: KlingErrorOptions = {}) {
    super('server_error', message, options);
  }
}

export class TimeoutError extends KlingError {
  constructor(message = 'Request timed out', options: KlingErrorOptions = {}) {
    super('timeout', message, options);
  }
}

export class DecodeError extends KlingError {
  constructor(message: string, options: KlingErrorOptions = {}) {
    super('decode', message, options);
  }
}

export class ApiError extends KlingError {
  constructor(message: string, options: KlingErrorOptions = {}) {
    super('api', message, options);
  }
}

export class TaskFailedError extends KlingError {
  public readonly taskId: string;
  public readonly statusMessage: string;

  constructor(taskId: string, statusMessage: string) {
    super('task_failed', `Task ${taskId} failed: ${statusMessage}`, {
      details: { taskId, statusMessage }
    });
    this.taskId = taskId;
    this.statusMessage = statusMessage;
  }
}

export type CancellationReason = 'remote' | 'aborted';

export class TaskCancelledError extends KlingError {
  public readonly taskId: string;
  public readonly reason: CancellationReason;

  constructor(taskId: string, reason: CancellationReason = 'remote') {
    super(
      'cancelled',
      reason === 'remote' ? `Task ${taskId} was cancelled` : `Waiting for task ${taskId} was aborted`,
      { details: { taskId, reason } }
    );
    this.taskId = taskId;
    this.reason = reason;
  }
}

/**
 * Wraps anything thrown below the client boundary into a `KlingError`.
 */
export function toKlingError(error: unknown, context: ErrorContext = {}): KlingError {
  if (error instanceof KlingError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  return new ApiError(message || 'An unexpected error occurred', {
    cause: error,
    details: { ...context }
  });
}

export interface ErrorContext {
  taskId?: string;
  family?: string;
  operation?: string;
  attempt?: number;
}

export interface ErrorSummary {
  message: string;
  type: string;
  kind: ErrorKind;
  retryable: boolean;
  requestId?: string;
  suggestions?: string[];
}

export function createErrorSummary(error: KlingError): ErrorSummary {
  const suggestions: string[] = [];

  switch (error.kind) {
    case 'authentication':
      suggestions.push('Check the API key and its expiry');
      break;
    case 'rate_limited':
      suggestions.push('Wait for the rate limit to reset');
      suggestions.push('Lower the request rate or the number of concurrent tasks');
      break;
    case 'validation':
      suggestions.push('Check the request parameters against the endpoint limits');
      break;
    case 'timeout':
      suggestions.push('Increase the timeout or the polling deadline');
      break;
    case 'server_error':
      suggestions.push('Try again in a few minutes');
      break;
    default:
      break;
  }

  return {
    message: error.message,
    type: error.name,
    kind: error.kind,
    retryable: error.retryable,
    requestId: error.requestId,
    suggestions: suggestions.length > 0 ? suggestions : undefined
  };
}

export function logError(error: KlingError, context: ErrorContext): void {
  const logData = {
    message: error.message,
    kind: error.kind,
    statusCode: error.statusCode,
    requestId: error.requestId,
    retryable: error.retryable,
    context: { ...error.details, ...context }
  };

  if (error.kind === 'server_error' || error.kind === 'decode' || error.kind === 'api') {
    logger.error('Kling request error', logData);
  } else {
    logger.warn('Kling client error', logData);
  }
}
