/**
 * Concrete error classes with proper status codes
 *
 * @fileoverview Every error the matching engine raises extends `BaseAppError`,
 * so the HTTP layer can serialize it without knowing its concrete type.
 *
 * @example
 * ```typescript
 * const notFound = AppNotFoundError.entity('job', 'job-42');
 * console.log(notFound.code);        // 'NOT_FOUND'
 * console.log(notFound.statusCode);  // 404
 *
 * const appError = toAppError(unknownError, 'rank_candidates');
 * ```
 */

import type { ZodError } from 'zod';
import type {
  AppError,
  ValidationError,
  NotFoundError,
  ConfigurationError
} from './result-types';

// ===== BASE ERROR CLASS =====

/**
 * Base error class that all application errors extend
 */
export class BaseAppError extends Error implements AppError {
  readonly code: string;
  readonly message: string;
  readonly statusCode: number;
  readonly details?: Record<string, unknown>;
  /** ISO timestamp when error was created */
  readonly timestamp: string;

  constructor(
    code: string,
    message: string,
    statusCode: number,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.message = message;
    this.statusCode = statusCode;
    this.details = details;
    this.timestamp = new Date().toISOString();

    // Maintains proper stack trace for where error was thrown (Node.js only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Converts the error to a JSON-serializable object for API responses and logs
   */
  toJSON(): AppError {
    return {
      code: this.code,
      message: this.message,
      statusCode: this.statusCode,
      details: this.details,
      timestamp: this.timestamp
    };
  }
}

// ===== VALIDATION ERRORS (400) =====

/**
 * Validation error for invalid input data
 *
 * @example
 * ```typescript
 * const fromSchema = AppValidationError.fromZodError(parsed.error);
 * ```
 */
export class AppValidationError extends BaseAppError implements ValidationError {
  readonly code = 'VALIDATION_ERROR' as const;
  /** The field that failed validation (if applicable) */
  readonly field?: string;
  /** List of validation rules that were violated */
  readonly validationRules?: string[];

  constructor(
    message: string,
    field?: string,
    validationRules?: string[],
    details?: Record<string, unknown>
  ) {
    super('VALIDATION_ERROR', message, 400, details);
    this.field = field;
    this.validationRules = validationRules;
  }

  /**
   * Collapses a zod failure into one error; the first issue names the field,
   * every issue is kept in `details.issues`.
   */
  static fromZodError(error: ZodError, context = 'input'): AppValidationError {
    const issues = error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message
    }));
    const first = issues[0];
    const field = first && first.path.length > 0 ? first.path : undefined;
    const message = first
      ? `Invalid ${context}: ${field ? `${field}: ` : ''}${first.message}`
      : `Invalid ${context}`;
    return new AppValidationError(message, field, ['schema'], { issues });
  }
}

// ===== NOT FOUND ERRORS (404) =====

export class AppNotFoundError extends BaseAppError implements NotFoundError {
  readonly code = 'NOT_FOUND' as const;
  readonly resource: string;
  readonly id?: string;

  constructor(resource: string, id?: string, details?: Record<string, unknown>) {
    const message = id
      ? `${resource} with ID '${id}' not found`
      : `${resource} not found`;
    super('NOT_FOUND', message, 404, details);
    this.resource = resource;
    this.id = id;
  }

  static entity(kind: string, id: string): AppNotFoundError {
    return new AppNotFoundError(kind === 'job' ? 'Job' : 'Candidate', id);
  }
}

/**
 * Raised when a compared pair spans two tenants.
 *
 * Serializes exactly like `AppNotFoundError` for the same resource so callers
 * cannot tell a foreign id from a missing one. Only the class name (visible in
 * server logs) differs.
 */
export class AppTenantMismatchError extends AppNotFoundError {
  constructor(kind: string, id: string) {
    super(kind === 'job' ? 'Job' : 'Candidate', id);
  }
}

// ===== REQUEST BODY ERRORS (4xx) =====

/**
 * A request body the JSON parser refused before any route ran, such as one
 * over the size limit (413)
 */
export class AppRequestBodyError extends BaseAppError {
  /** Parser failure type, e.g. `entity.too.large` */
  readonly reason: string;

  constructor(message: string, statusCode: number, reason: string) {
    super(
      statusCode === 413 ? 'PAYLOAD_TOO_LARGE' : 'INVALID_REQUEST_BODY',
      message,
      statusCode,
      { reason }
    );
    this.reason = reason;
  }
}

// ===== CONFIGURATION ERRORS (500) =====

/**
 * Startup-fatal configuration problem: no valid default weights means no
 * scoring call can run.
 */
export class AppConfigurationError extends BaseAppError implements ConfigurationError {
  readonly code = 'CONFIGURATION_ERROR' as const;
  readonly setting?: string;

  constructor(message: string, setting?: string, details?: Record<string, unknown>) {
    super('CONFIGURATION_ERROR', message, 500, details);
    this.setting = setting;
  }

  static invalidDefaultWeights(reason: string, details?: Record<string, unknown>): AppConfigurationError {
    return new AppConfigurationError(
      `Default weight configuration is invalid: ${reason}`,
      'weights',
      details
    );
  }
}

// ===== ERROR CONVERSION UTILITIES =====

/**
 * Converts unknown errors to typed AppError instances
 *
 * @example
 * ```typescript
 * try {
 *   // Some operation that might throw
 * } catch (unknownError) {
 *   return failure(toAppError(unknownError, 'explain_pair'));
 * }
 * ```
 */
export function toAppError(error: unknown, context = 'Unknown operation'): AppError {
  if (error instanceof BaseAppError) {
    return error;
  }

  if (error instanceof Error) {
    return new BaseAppError(
      'INTERNAL_ERROR',
      `Unexpected error in ${context}`,
      500,
      { originalError: error.message }
    );
  }

  return new BaseAppError(
    'UNKNOWN_ERROR',
    `Unknown error in ${context}: ${String(error)}`,
    500,
    { originalError: error }
  );
}

export function isAppError(error: unknown): error is BaseAppError {
  return error instanceof BaseAppError;
}
