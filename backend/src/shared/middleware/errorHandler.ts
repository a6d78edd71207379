import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { ZodError } from 'zod';
import { QueryFailedError, TypeORMError } from 'typeorm';
import type { ApiErrorCode } from '@microblog/contracts';
import { logger } from '@shared/utils/logger.js';

export type ErrorCode = ApiErrorCode;

export class AppError extends Error {
  constructor(
    public readonly statusCode: number,
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = 'AppError';
  }
}

export function isAppError(error: unknown, code?: ErrorCode): error is AppError {
  return error instanceof AppError && (code === undefined || error.code === code);
}

/**
 * Factory helpers so call sites read `throw Errors.duplicateUsername(name)`
 */
export const Errors = {
  duplicateUsername: (username: string) =>
    new AppError(409, 'DuplicateUsername', `Username "${username}" is already registered`),
  duplicateEmail: (email: string) =>
    new AppError(409, 'DuplicateEmail', `Email address "${email}" is already registered`),
  usernameUnavailable: (username: string) =>
    new AppError(409, 'UsernameUnavailable', `Username "${username}" is not available`),
  invalidBody: (message = 'Post body must be between 1 and 140 characters') =>
    new AppError(400, 'InvalidBody', message),
  invalidAboutMe: (max: number) =>
    new AppError(400, 'InvalidAboutMe', `About me must be at most ${max} characters`),
  selfFollow: (action: 'follow' | 'unfollow') =>
    new AppError(400, 'SelfFollow', `You cannot ${action} yourself`),
  tokenInvalid: () =>
    new AppError(400, 'TokenInvalid', 'Invalid or expired reset token'),
  identityNotFound: (ref: string | number) =>
    new AppError(404, 'IdentityNotFound', `User ${ref} not found`),
  storageUnavailable: (message = 'Storage is unavailable') =>
    new AppError(503, 'StorageUnavailable', message),
  validation: (message: string, details?: unknown) =>
    new AppError(400, 'ValidationError', message, details),
  unauthorized: (message = 'Authentication required') =>
    new AppError(401, 'Unauthorized', message),
  notFound: (message = 'Not found') =>
    new AppError(404, 'NotFound', message),
};

/**
 * Failures raised by TypeORM or by the database driver underneath it.
 * Driver errors (pg, better-sqlite3, socket errors) carry a string `code`.
 */
export function isStoreFailure(error: unknown): error is Error {
  if (error instanceof QueryFailedError || error instanceof TypeORMError) return true;
  if (!(error instanceof Error) || !('code' in error)) return false;
  return typeof error.code === 'string';
}

/**
 * Map a failure from the persistence layer onto the error taxonomy.
 * Store failures become StorageUnavailable with a fixed message; the driver
 * text is logged, never returned. Anything else is passed back unchanged.
 */
export function toStorageError(error: unknown): unknown {
  if (error instanceof AppError || !isStoreFailure(error)) return error;
  logger.error('Storage failure:', error.message);
  return Errors.storageUnavailable();
}

/**
 * Wrap an async route handler so rejections reach the error middleware
 */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>
): RequestHandler {
  return (req, res, next) => {
    fn(req, res, next).catch(next);
  };
}

/**
 * Express error middleware (must be registered last)
 */
export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  if (err instanceof AppError) {
    if (err.statusCode >= 500) {
      logger.error(`${req.method} ${req.path} failed: ${err.code}`, err.message);
    }
    res.status(err.statusCode).json({
      error: err.code,
      message: err.message,
      ...(err.details !== undefined ? { details: err.details } : {}),
    });
    return;
  }

  if (err instanceof ZodError) {
    res.status(400).json({
      error: 'ValidationError',
      message: 'Invalid request',
      details: err.flatten(),
    });
    return;
  }

  if (err instanceof QueryFailedError || err instanceof TypeORMError) {
    logger.error(`${req.method} ${req.path} storage failure:`, err.message);
    res.status(503).json({ error: 'StorageUnavailable', message: 'Storage is unavailable' });
    return;
  }

  logger.error(`${req.method} ${req.path} unhandled error:`, err);
  res.status(500).json({ error: 'InternalError', message: 'Internal server error' });
}
