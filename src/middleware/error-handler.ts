/**
 * Error Handler Middleware
 * ApiError, async route wrapper and the JSON error responder
 */

import { NextFunction, Request, RequestHandler, Response } from 'express';
import { ConfigurationError, RemoteStoreError, StateError } from '../lib/cache/cache.errors';

export class ApiError extends Error {
  readonly statusCode: number;
  readonly details?: unknown;

  constructor(statusCode: number, message: string, details?: unknown) {
    super(message);
    this.name = 'ApiError';
    this.statusCode = statusCode;
    this.details = details;
  }
}

/**
 * Forward rejections of an async route handler to the error middleware
 */
export const asyncHandler =
  (handler: (req: Request, res: Response, next: NextFunction) => Promise<void>): RequestHandler =>
  (req, res, next) => {
    handler(req, res, next).catch(next);
  };

/**
 * HTTP status for an error raised while serving a request
 */
export function statusFor(error: unknown): number {
  if (error instanceof ApiError) {
    return error.statusCode;
  }
  if (error instanceof RangeError || error instanceof ConfigurationError) {
    return 400;
  }
  if (error instanceof RemoteStoreError) {
    return 503;
  }
  if (error instanceof StateError) {
    return 502;
  }
  return 500;
}

export const errorHandler = (err: unknown, req: Request, res: Response, _next: NextFunction): void => {
  const statusCode = statusFor(err);
  const message = err instanceof Error ? err.message : 'Internal server error';

  if (statusCode >= 500) {
    console.error(`[ErrorHandler] ${req.method} ${req.path} failed:`, err);
  }

  res.status(statusCode).json({
    success: false,
    error: statusCode === 500 && process.env.NODE_ENV === 'production' ? 'Internal server error' : message,
    ...(err instanceof StateError ? { code: err.code } : {}),
    ...(err instanceof ApiError && err.details !== undefined ? { details: err.details } : {}),
  });
};
