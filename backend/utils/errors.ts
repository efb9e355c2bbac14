/**
 * Error taxonomy shared by services, controllers and the Express error middleware.
 * Every class carries the HTTP status it is surfaced with.
 */

export type ErrorCode =
  | 'CONFIGURATION_ERROR'
  | 'NOT_FOUND'
  | 'VALIDATION_ERROR'
  | 'UPSTREAM_SERVICE_ERROR'
  | 'MALFORMED_RESPONSE';

export type ErrorDetails = Record<string, unknown>;

export abstract class AppError extends Error {
  abstract readonly code: ErrorCode;
  abstract readonly statusCode: number;
  readonly details?: ErrorDetails;

  constructor(message: string, details?: ErrorDetails) {
    super(message);
    this.name = new.target.name;
    this.details = details;
  }

  toJSON(): { error: ErrorCode; message: string; details?: ErrorDetails } {
    return this.details
      ? { error: this.code, message: this.message, details: this.details }
      : { error: this.code, message: this.message };
  }
}

/** Missing credential or setting detected at startup. */
export class ConfigurationError extends AppError {
  readonly code = 'CONFIGURATION_ERROR' as const;
  readonly statusCode = 500;
}

export class NotFoundError extends AppError {
  readonly code = 'NOT_FOUND' as const;
  readonly statusCode = 404;
}

/** Caller-supplied value outside its domain. Raised before any external call. */
export class ValidationError extends AppError {
  readonly code = 'VALIDATION_ERROR' as const;
  readonly statusCode = 400;
}

/** LLM, storage or record-store call failed. Never retried by the services. */
export class UpstreamServiceError extends AppError {
  readonly code = 'UPSTREAM_SERVICE_ERROR' as const;
  readonly statusCode = 500;
}

/** Model output could not be coerced into the required schema. */
export class MalformedResponseError extends AppError {
  readonly code = 'MALFORMED_RESPONSE' as const;
  readonly statusCode = 500;
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
