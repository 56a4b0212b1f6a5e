/**
 * Serving error utilities.
 *
 * One error class per failure in the serving taxonomy, plus helpers that
 * turn any of them (or an unknown throw) into the small, stable shape the
 * router hands to clients.
 */

import type { ZodError } from 'zod';

/**
 * Error codes surfaced by the serving layer.
 */
export type ServingErrorCode =
  | 'UNSUPPORTED_TYPE'
  | 'INVALID_SCHEMA'
  | 'MODEL_NOT_FOUND'
  | 'SIGNATURE_MISMATCH'
  | 'LOAD_FAILED'
  | 'VALIDATION_FAILED'
  | 'PREDICTION_FAILED'
  | 'CANCELLED'
  | 'INTERNAL_ERROR';

/**
 * Base class for every error raised by the serving core.
 */
export class ServingError extends Error {
  public readonly code: ServingErrorCode;
  public readonly details: Record<string, unknown>;
  public readonly retryable: boolean;

  constructor(
    code: ServingErrorCode,
    message: string,
    details: Record<string, unknown> = {},
    options: { retryable?: boolean; cause?: unknown } = {}
  ) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'ServingError';
    this.code = code;
    this.details = details;
    this.retryable = options.retryable ?? false;
  }

  /**
   * Serialize error into plain shape (for logs).
   */
  public toObject(): { code: ServingErrorCode; message: string; details: Record<string, unknown> } {
    return {
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * A declared field uses a type outside the supported set.
 */
export class UnsupportedTypeError extends ServingError {
  constructor(fieldName: string, declaredType: string) {
    super('UNSUPPORTED_TYPE', `Field '${fieldName}' declares unsupported type '${declaredType}'`, {
      field: fieldName,
      type: declaredType,
    });
    this.name = 'UnsupportedTypeError';
  }
}

/**
 * The schema cannot back a contract (no outputs, duplicate names, ...).
 */
export class InvalidSchemaError extends ServingError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super('INVALID_SCHEMA', message, details);
    this.name = 'InvalidSchemaError';
  }
}

/**
 * The registry has no such model name or version.
 */
export class ModelNotFoundError extends ServingError {
  public readonly modelName: string;
  public readonly versionId: string;

  constructor(modelName: string, versionId: string) {
    super('MODEL_NOT_FOUND', `Model '${modelName}' has no version '${versionId}'`, {
      modelName,
      versionId,
    });
    this.name = 'ModelNotFoundError';
    this.modelName = modelName;
    this.versionId = versionId;
  }
}

/**
 * A loaded version declares a schema the endpoint was not built against.
 */
export class SignatureMismatchError extends ServingError {
  public readonly versionId: string;
  public readonly expected: string;
  public readonly actual: string;

  constructor(versionId: string, expected: string, actual: string) {
    super(
      'SIGNATURE_MISMATCH',
      `Version '${versionId}' declares ${actual}, endpoint expects ${expected}`,
      { versionId, expected, actual }
    );
    this.name = 'SignatureMismatchError';
    this.versionId = versionId;
    this.expected = expected;
    this.actual = actual;
  }
}

/**
 * Registry or model initialization failed for a reason unrelated to the schema.
 *
 * Callers may retry; the cache never does.
 */
export class LoadFailure extends ServingError {
  public readonly versionId: string;

  constructor(versionId: string, message: string, cause?: unknown) {
    super('LOAD_FAILED', message, { versionId }, { retryable: true, cause });
    this.name = 'LoadFailure';
    this.versionId = versionId;
  }
}

/**
 * Request payload does not match the generated contract.
 */
export class ValidationError extends ServingError {
  public readonly issues: Array<{ path: string; message: string }>;

  constructor(message: string, issues: Array<{ path: string; message: string }> = []) {
    super('VALIDATION_FAILED', message, { issues });
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

/**
 * Predict rejected or returned rows that do not fit the response contract.
 */
export class PredictionError extends ServingError {
  constructor(versionId: string, message: string, cause?: unknown) {
    super('PREDICTION_FAILED', message, { versionId }, { cause });
    this.name = 'PredictionError';
  }
}

/**
 * A waiter gave up before its version was ready.
 */
export class CancelledError extends ServingError {
  constructor(versionId: string, reason?: unknown) {
    super('CANCELLED', `Request for version '${versionId}' was cancelled`, { versionId }, { cause: reason });
    this.name = 'CancelledError';
  }
}

/**
 * Check if error belongs to the serving taxonomy
 */
export function isServingError(error: unknown): error is ServingError {
  return error instanceof ServingError;
}

/**
 * Convert Zod validation error to ValidationError
 *
 * @example
 * ```typescript
 * const result = contract.request.safeParse({ promt: 'hi' });
 * if (!result.success) {
 *   throw zodErrorToValidationError(result.error);
 * }
 * // Throws: "Validation error on field 'root': Unrecognized key(s) in object: 'promt'"
 * ```
 */
export function zodErrorToValidationError(error: ZodError): ValidationError {
  const issues = error.issues.map((issue) => ({
    path: issue.path.length > 0 ? issue.path.join('.') : 'root',
    message: issue.message,
  }));
  const first = issues[0] ?? { path: 'root', message: 'Invalid request' };

  return new ValidationError(`Validation error on field '${first.path}': ${first.message}`, issues);
}

/**
 * Client-facing error shape produced by the request router.
 */
export interface RoutingError {
  status: number;
  code: ServingErrorCode | 'VERSION_CONFLICT';
  message: string;
  issues?: Array<{ path: string; message: string }>;
}

/**
 * Map any error into the stable client-visible shape.
 *
 * Only validation issues describe the caller's own input and are passed
 * through; every other message is fixed per code.
 */
export function toRoutingError(error: unknown, versionId?: string): RoutingError {
  const version = versionId !== undefined ? ` '${versionId}'` : '';

  if (error instanceof ValidationError) {
    return {
      status: 400,
      code: 'VALIDATION_FAILED',
      message: error.message,
      issues: error.issues,
    };
  }

  if (error instanceof SignatureMismatchError || error instanceof ModelNotFoundError) {
    return {
      status: 409,
      code: 'VERSION_CONFLICT',
      message: `Requested version${version} cannot serve this endpoint's contract`,
    };
  }

  if (error instanceof LoadFailure) {
    return {
      status: 500,
      code: 'LOAD_FAILED',
      message: `Version${version} could not be loaded`,
    };
  }

  if (error instanceof PredictionError) {
    return {
      status: 500,
      code: 'PREDICTION_FAILED',
      message: `Version${version} failed to produce a prediction`,
    };
  }

  if (error instanceof CancelledError) {
    return {
      status: 503,
      code: 'CANCELLED',
      message: 'Request was cancelled before the model was ready',
    };
  }

  return {
    status: 500,
    code: 'INTERNAL_ERROR',
    message: 'Internal server error',
  };
}
