export type ErrorDetails = Record<string, string | number>;

export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: string;
  public readonly isOperational: boolean;
  public readonly details: ErrorDetails;

  constructor(
    message: string,
    options: {
      statusCode?: number;
      code?: string;
      isOperational?: boolean;
      cause?: Error;
      details?: ErrorDetails;
    } = {},
  ) {
    super(message, { cause: options.cause });
    this.name = this.constructor.name;
    this.statusCode = options.statusCode ?? 500;
    this.code = options.code ?? 'INTERNAL_ERROR';
    this.isOperational = options.isOperational ?? true;
    this.details = options.details ?? {};
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      success: false,
      error: {
        code: this.code,
        message: this.message,
        ...this.details,
      },
    };
  }
}

export class ValidationError extends AppError {
  constructor(
    message: string,
    options: { cause?: Error; code?: string; details?: ErrorDetails } = {},
  ) {
    super(message, {
      statusCode: 400,
      code: 'VALIDATION_ERROR',
      ...options,
    });
  }
}

/**
 * Why a candidate statement was refused by the SQL guard. One reason per
 * guard pass; the first failing pass decides.
 */
export type SqlRejectionReason =
  | 'EmptyInput'
  | 'CommentNotAllowed'
  | 'MultipleStatements'
  | 'MisplacedTerminator'
  | 'CteNotAllowed'
  | 'NotASelect'
  | 'ForbiddenToken'
  | 'MisplacedTop';

export class SqlValidationError extends ValidationError {
  public readonly reason: SqlRejectionReason;
  public readonly token: string | undefined;

  constructor(reason: SqlRejectionReason, message: string, token?: string) {
    super(message, {
      code: 'SQL_REJECTED',
      details: token === undefined ? { reason } : { reason, token },
    });
    this.reason = reason;
    this.token = token;
  }
}

export class NotFoundError extends AppError {
  constructor(message = 'Resource not found', options: { cause?: Error } = {}) {
    super(message, {
      statusCode: 404,
      code: 'NOT_FOUND',
      ...options,
    });
  }
}

export class RateLimitError extends AppError {
  public readonly retryAfter: number;

  constructor(
    message = 'Rate limit exceeded',
    options: { cause?: Error; retryAfter?: number } = {},
  ) {
    const retryAfter = options.retryAfter ?? 60;
    super(message, {
      statusCode: 429,
      code: 'RATE_LIMIT_ERROR',
      cause: options.cause,
      details: { retryAfter },
    });
    this.retryAfter = retryAfter;
  }
}

export class GenerationError extends AppError {
  constructor(message: string, options: { cause?: Error } = {}) {
    super(message, {
      statusCode: 502,
      code: 'GENERATION_FAILED',
      ...options,
    });
  }
}

export class DatabaseError extends AppError {
  constructor(message: string, options: { cause?: Error } = {}) {
    super(message, {
      statusCode: 500,
      code: 'DATABASE_ERROR',
      ...options,
    });
  }
}

export class SchemaNotLoadedError extends AppError {
  constructor(message = 'Database schema has not been loaded yet') {
    super(message, {
      statusCode: 503,
      code: 'SCHEMA_UNAVAILABLE',
    });
  }
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
