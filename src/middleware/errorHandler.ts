import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { DatabaseError } from 'pg';
import { AppError, AuthError, StorageError } from '../errors';
import { ErrorResponse } from '../types';

function send(res: Response, status: number, body: ErrorResponse): void {
  res.status(status).json(body);
}

function isBodyParseError(error: unknown): error is SyntaxError & { status: number } {
  return error instanceof SyntaxError && 'status' in error && error.status === 400;
}

export const errorHandler = (error: unknown, req: Request, res: Response, next: NextFunction) => {
  if (res.headersSent) {
    return next(error);
  }

  if (error instanceof ZodError) {
    return send(res, 400, {
      error: { message: 'Validation error', code: 'VALIDATION_ERROR', details: error.issues },
    });
  }

  if (isBodyParseError(error)) {
    return send(res, 400, { error: { message: 'Malformed JSON body', code: 'VALIDATION_ERROR' } });
  }

  if (error instanceof DatabaseError) {
    console.error(`[ErrorHandler] Database error on ${req.method} ${req.originalUrl}:`, error.message);
    const storageError = new StorageError();
    return send(res, storageError.statusCode, {
      error: { message: storageError.message, code: storageError.code },
    });
  }

  if (error instanceof AppError) {
    if (error instanceof AuthError) {
      res.setHeader('WWW-Authenticate', 'Bearer');
    }
    if (error.statusCode >= 500) {
      console.error(`[ErrorHandler] ${error.name} on ${req.method} ${req.originalUrl}: ${error.message}`);
    }
    return send(res, error.statusCode, {
      error: {
        message: error.message,
        code: error.code,
        ...(error.details !== undefined ? { details: error.details } : {}),
      },
    });
  }

  console.error(`[ErrorHandler] Unhandled error on ${req.method} ${req.originalUrl}:`, error);
  return send(res, 500, { error: { message: 'Internal server error', code: 'INTERNAL_SERVER_ERROR' } });
};
