import type { ZodError } from 'zod';

export interface AppErrorOptions {
  detail?: string;
}

export class AppError extends Error {
  public statusCode: number;
  public code: string;
  public detail?: string;

  constructor(message: string, statusCode: number = 500, code: string = 'INTERNAL_ERROR', options: AppErrorOptions = {}) {
    super(message);
    this.name = this.constructor.name;
    this.statusCode = statusCode;
    this.code = code;
    this.detail = options.detail;

    Error.captureStackTrace(this, this.constructor);
  }
}

export class ValidationError extends AppError {
  constructor(message: string, code: string = 'VALIDATION_ERROR', options?: AppErrorOptions) {
    super(message, 400, code, options);
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string) {
    super(`${resource} not found`, 404, 'NOT_FOUND');
  }
}

export class ServiceUnavailableError extends AppError {
  constructor(message: string = 'Service temporarily unavailable', code: string = 'SERVICE_UNAVAILABLE') {
    super(message, 503, code);
  }
}

export class InternalServerError extends AppError {
  constructor(message: string = 'Internal Server Error', code: string = 'INTERNAL_SERVER_ERROR') {
    super(message, 500, code);
  }
}

/**
 * A data file or table could not be read into the snapshot.
 */
export class DataLoadError extends AppError {
  constructor(message: string) {
    super(message, 500, 'DATA_LOAD_FAILED');
  }
}

// =============================================================================
// Analytics engine errors
// =============================================================================

/**
 * The data snapshot never loaded; raised before any computation.
 */
export class DataUnavailableError extends ServiceUnavailableError {
  constructor(message: string = 'Data not available') {
    super(message, 'DATA_UNAVAILABLE');
  }
}

export class InvalidParameterError extends ValidationError {
  constructor(message: string, options?: AppErrorOptions) {
    super(message, 'INVALID_PARAMETER', options);
  }

  static fromZod(error: ZodError): InvalidParameterError {
    const [first] = error.issues;
    const message = first ? first.message : 'Invalid parameters';
    const detail = error.issues
      .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    return new InvalidParameterError(message, { detail });
  }
}

/**
 * Unexpected failure while aggregating; the message never carries internals.
 */
export class ComputationError extends InternalServerError {
  constructor(message: string = 'Analytics computation failed') {
    super(message, 'COMPUTATION_ERROR');
  }
}

export type AnalyticsError = DataUnavailableError | InvalidParameterError | ComputationError;
