/**
 * Application error classes
 * Every failure the engine reports carries a kind from this taxonomy
 */

export type ErrorKind =
  // validation
  | 'UnknownTool'
  | 'MissingRequiredParameter'
  | 'InvalidParameterType'
  | 'ConstraintViolation'
  // authorization
  | 'RateLimited'
  | 'Forbidden'
  // execution
  | 'Timeout'
  | 'UpstreamUnavailable'
  // document resolution
  | 'UnknownChunk'
  // registration
  | 'DuplicateTool'
  // transport
  | 'InvalidRequest'
  | 'Unauthorized'
  | 'NotFound'
  | 'Internal';

export interface ErrorDetail {
  field?: string;
  message: string;
}

export interface ErrorEnvelope {
  kind: ErrorKind;
  message: string;
}

export interface ErrorResponse {
  error: ErrorEnvelope & {
    details?: ErrorDetail[];
    correlationId?: string;
  };
}

/**
 * Base application error
 */
export class AppError extends Error {
  constructor(
    public readonly kind: ErrorKind,
    message: string,
    public readonly statusCode: number,
    public readonly details?: ErrorDetail[]
  ) {
    super(message);
    this.name = 'AppError';
    Error.captureStackTrace(this, this.constructor);
  }

  toEnvelope(): ErrorEnvelope {
    return { kind: this.kind, message: this.message };
  }

  toResponse(correlationId?: string): ErrorResponse {
    return {
      error: {
        kind: this.kind,
        message: this.message,
        details: this.details,
        correlationId,
      },
    };
  }
}

export class UnknownToolError extends AppError {
  constructor(public readonly toolName: string) {
    super('UnknownTool', `Unknown tool '${toolName}'`, 404);
    this.name = 'UnknownToolError';
  }
}

/**
 * Base for errors that name the offending parameter
 */
export abstract class ParameterError extends AppError {
  constructor(
    kind: 'MissingRequiredParameter' | 'InvalidParameterType' | 'ConstraintViolation',
    public readonly parameter: string,
    message: string
  ) {
    super(kind, message, 400, [{ field: parameter, message }]);
  }
}

export class MissingRequiredParameterError extends ParameterError {
  constructor(parameter: string) {
    super('MissingRequiredParameter', parameter, `Missing required parameter '${parameter}'`);
    this.name = 'MissingRequiredParameterError';
  }
}

export class InvalidParameterTypeError extends ParameterError {
  constructor(parameter: string, expected: string) {
    super('InvalidParameterType', parameter, `Parameter '${parameter}' must be ${expected}`);
    this.name = 'InvalidParameterTypeError';
  }
}

export class ConstraintViolationError extends ParameterError {
  constructor(parameter: string, constraint: string) {
    super('ConstraintViolation', parameter, `Parameter '${parameter}' ${constraint}`);
    this.name = 'ConstraintViolationError';
  }
}

/**
 * 429 Too Many Requests - caller quota exhausted
 */
export class RateLimitError extends AppError {
  constructor(
    message = 'Too many requests',
    public readonly retryAfterMs?: number
  ) {
    super('RateLimited', message, 429);
    this.name = 'RateLimitError';
  }
}

/**
 * 403 Forbidden - role requirement not met
 */
export class ForbiddenError extends AppError {
  constructor(message = 'Insufficient permissions') {
    super('Forbidden', message, 403);
    this.name = 'ForbiddenError';
  }
}

export class TimeoutError extends AppError {
  constructor(message = 'Operation timed out') {
    super('Timeout', message, 504);
    this.name = 'TimeoutError';
  }
}

/**
 * 502 Bad Gateway - a backing service failed
 */
export class UpstreamUnavailableError extends AppError {
  constructor(
    message: string,
    public readonly upstream: string,
    public readonly originalError?: unknown
  ) {
    super('UpstreamUnavailable', message, 502);
    this.name = 'UpstreamUnavailableError';
  }
}

export class UnknownChunkError extends AppError {
  constructor(public readonly chunkId: string) {
    super('UnknownChunk', `Unknown document chunk '${chunkId}'`, 404);
    this.name = 'UnknownChunkError';
  }
}

export class DuplicateToolError extends AppError {
  constructor(toolName: string) {
    super('DuplicateTool', `Tool '${toolName}' is already registered`, 409);
    this.name = 'DuplicateToolError';
  }
}

/**
 * 400 Bad Request - malformed envelope
 */
export class InvalidRequestError extends AppError {
  constructor(message: string, details?: ErrorDetail[]) {
    super('InvalidRequest', message, 400, details);
    this.name = 'InvalidRequestError';
  }
}

export class UnauthorizedError extends AppError {
  constructor(message = 'Authentication required') {
    super('Unauthorized', message, 401);
    this.name = 'UnauthorizedError';
  }
}

export class NotFoundError extends AppError {
  constructor(resource = 'Resource') {
    super('NotFound', `${resource} not found`, 404);
    this.name = 'NotFoundError';
  }
}

/**
 * 500 Internal Server Error - unexpected error
 */
export class InternalError extends AppError {
  constructor(message = 'Internal server error') {
    super('Internal', message, 500);
    this.name = 'InternalError';
  }
}

/**
 * Check if error is an AppError
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}
