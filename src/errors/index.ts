import { scalerConstants } from '../config/config.js';

/**
 * Scaler error taxonomy
 *
 * - ConfigError: scaler metadata missing or invalid, fatal to scaler creation
 * - AuthError: identity provider call failed or the token cannot be used yet
 * - QueryError: query request failed or its body could not be read
 * - ValidationError: query result does not have the expected shape
 */

export const truncateBody = (body: string, maxLength: number = scalerConstants.maxErrorBodyLength): string => {
  if (body.length <= maxLength) {
    return body;
  }
  return `${body.slice(0, maxLength)}...`;
};

export class ConfigError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'ConfigError';
  }
}

export class AuthError extends Error {
  readonly status?: number;
  readonly body?: string;

  constructor(message: string, options: { status?: number; body?: string; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'AuthError';
    this.status = options.status;
    this.body = options.body === undefined ? undefined : truncateBody(options.body);
  }
}

export type QueryErrorReason = 'http_status' | 'transport' | 'empty_body' | 'decode';

export class QueryError extends Error {
  readonly status: number;
  readonly body: string;
  readonly reason: QueryErrorReason;

  constructor(message: string, status: number, body: string, reason: QueryErrorReason, cause?: unknown) {
    super(message, { cause });
    this.name = 'QueryError';
    this.status = status;
    this.body = truncateBody(body);
    this.reason = reason;
  }
}

export type ValidationErrorCode =
  | 'NO_TABLES'
  | 'TOO_MANY_TABLES'
  | 'NO_COLUMNS'
  | 'NO_ROWS'
  | 'TOO_MANY_ROWS'
  | 'INVALID_VALUE_TYPE'
  | 'VALUE_NOT_NUMERIC'
  | 'NEGATIVE_VALUE'
  | 'INVALID_THRESHOLD_TYPE'
  | 'THRESHOLD_NOT_NUMERIC'
  | 'NEGATIVE_THRESHOLD'
  | 'EMPTY_THRESHOLD';

export class ValidationError extends Error {
  readonly code: ValidationErrorCode;

  constructor(code: ValidationErrorCode, message: string) {
    super(message);
    this.name = 'ValidationError';
    this.code = code;
  }
}

/**
 * Maps scaler errors to the HTTP status the scaler routes answer with
 */
export const httpStatusForError = (error: unknown): number => {
  if (error instanceof ConfigError) {
    return 400;
  }
  if (error instanceof ValidationError) {
    return 422;
  }
  if (error instanceof AuthError || error instanceof QueryError) {
    return 502;
  }
  return 500;
};

export const getErrorMessage = (error: unknown): string => {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  return 'Unknown error';
};
