/**
 * Result pattern for type-safe error handling
 *
 * @fileoverview Services return a `Result` for failures that depend on caller
 * input (unknown ids, bad weight patches) instead of throwing, so route
 * handlers can branch on `isSuccess` / `isFailure` with full narrowing.
 *
 * @example
 * ```typescript
 * const result = service.updateWeights({ components: { skill: 0.9 } });
 * if (isSuccess(result)) {
 *   console.log(result.data.version);
 * } else {
 *   console.error(result.error.code); // 'VALIDATION_ERROR'
 * }
 * ```
 */

// ===== CORE RESULT TYPES =====

/**
 * Result type representing either success with data or failure with error
 */
export type Result<T, E = AppError> = Success<T> | Failure<E>;

export interface Success<T> {
  readonly success: true;
  readonly data: T;
}

export interface Failure<E> {
  readonly success: false;
  readonly error: E;
}

// ===== RESULT CONSTRUCTORS =====

export const success = <T>(data: T): Success<T> => ({ success: true, data });

export const failure = <E>(error: E): Failure<E> => ({ success: false, error });

// ===== ERROR SHAPES =====

// Base application error interface
export interface AppError {
  readonly code: string;
  readonly message: string;
  readonly statusCode: number;
  readonly details?: Record<string, unknown>;
  readonly timestamp?: string;
}

export interface ValidationError extends AppError {
  readonly code: 'VALIDATION_ERROR';
  readonly field?: string;
  readonly validationRules?: string[];
}

export interface NotFoundError extends AppError {
  readonly code: 'NOT_FOUND';
  readonly resource: string;
  readonly id?: string;
}

export interface ConfigurationError extends AppError {
  readonly code: 'CONFIGURATION_ERROR';
  readonly setting?: string;
}

// Result types for specific operations
export type MatchQueryResult<T> = Result<T, NotFoundError | ValidationError>;
export type WeightUpdateResult<T> = Result<T, ValidationError>;

// ===== TYPE GUARDS =====

/**
 * Type guard to check if a Result is a Success
 *
 * @example
 * ```typescript
 * if (isSuccess(result)) {
 *   console.log(result.data); // TypeScript knows this is T
 * }
 * ```
 */
export const isSuccess = <T, E>(result: Result<T, E>): result is Success<T> => {
  return result.success === true;
};

/**
 * Type guard to check if a Result is a Failure
 */
export const isFailure = <T, E>(result: Result<T, E>): result is Failure<E> => {
  return result.success === false;
};
