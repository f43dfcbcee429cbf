export class AppError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly code: string,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = 'AppError';
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 400, 'VALIDATION_ERROR', details);
    this.name = 'ValidationError';
  }
}

export type AuthFailureReason =
  | 'MissingToken'
  | 'MalformedToken'
  | 'ExpiredToken'
  | 'UnknownSubject'
  | 'InvalidCredentials';

export class AuthError extends AppError {
  constructor(public readonly reason: AuthFailureReason, message = 'Could not validate credentials') {
    super(message, 401, 'AUTH_ERROR');
    this.name = 'AuthError';
  }
}

/**
 * Missing and not-owned resources both surface as this error, so callers
 * cannot probe for records that belong to other accounts.
 */
export class NotFoundError extends AppError {
  constructor(message = 'Not found') {
    super(message, 404, 'NOT_FOUND');
    this.name = 'NotFoundError';
  }
}

export abstract class UpstreamError extends AppError {}

export class UpstreamTimeoutError extends UpstreamError {
  constructor(message = 'Inference service timeout') {
    super(message, 504, 'UPSTREAM_TIMEOUT');
    this.name = 'UpstreamTimeoutError';
  }
}

export class UpstreamUnavailableError extends UpstreamError {
  constructor(message = 'Cannot connect to inference service') {
    super(message, 503, 'UPSTREAM_UNAVAILABLE');
    this.name = 'UpstreamUnavailableError';
  }
}

export class UpstreamProtocolError extends UpstreamError {
  constructor(message: string, public readonly upstreamStatus?: number) {
    super(message, 503, 'UPSTREAM_PROTOCOL_ERROR');
    this.name = 'UpstreamProtocolError';
  }
}

export class StorageError extends AppError {
  constructor(message = 'Database error', details?: unknown) {
    super(message, 500, 'DATABASE_ERROR', details);
    this.name = 'StorageError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
