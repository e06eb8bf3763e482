export type ErrorKind =
  | 'validation_error'
  | 'authentication_required'
  | 'permission_denied'
  | 'not_found';

export type FieldErrors = Record<string, string[]>;

export interface ErrorBody {
  error: ErrorKind | 'internal_error';
  message: string;
  details?: FieldErrors;
}

/**
 * Base class for every error the API answers with a 4xx status.
 * Anything thrown that is not an ApiError is treated as an internal failure.
 */
export abstract class ApiError extends Error {
  abstract readonly kind: ErrorKind;
  abstract readonly statusCode: number;

  toBody(): ErrorBody {
    return { error: this.kind, message: this.message };
  }
}

export class ValidationError extends ApiError {
  readonly kind = 'validation_error';
  readonly statusCode = 400;

  constructor(
    readonly details: FieldErrors,
    message = 'Invalid input.',
  ) {
    super(message);
    this.name = 'ValidationError';
  }

  override toBody(): ErrorBody {
    return { ...super.toBody(), details: this.details };
  }
}

export class AuthenticationRequired extends ApiError {
  readonly kind = 'authentication_required';
  readonly statusCode = 401;

  constructor(message = 'Authentication credentials were not provided.') {
    super(message);
    this.name = 'AuthenticationRequired';
  }
}

export class PermissionDenied extends ApiError {
  readonly kind = 'permission_denied';
  readonly statusCode = 403;

  constructor(message = 'You do not have permission to perform this action.') {
    super(message);
    this.name = 'PermissionDenied';
  }
}

export class NotFound extends ApiError {
  readonly kind = 'not_found';
  readonly statusCode = 404;

  constructor(message = 'Not found.') {
    super(message);
    this.name = 'NotFound';
  }
}

export function isApiError(error: unknown): error is ApiError {
  return error instanceof ApiError;
}
