import { Request, Response, NextFunction } from 'express';
import { appConfig } from '../config';
import { logger } from '../utils/logger';

export class ApiError extends Error {
  statusCode: number;
  isOperational: boolean;
  details?: unknown;

  constructor(statusCode: number, message: string, details?: unknown, isOperational = true) {
    super(message);
    this.name = 'ApiError';
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    this.details = details;
    Error.captureStackTrace(this, this.constructor);
  }
}

export const errorHandler = (
  err: unknown,
  req: Request,
  res: Response,
  // Express recognises error middleware by its four parameters
  next: NextFunction
) => {
  const error =
    err instanceof ApiError
      ? err
      : new ApiError(500, err instanceof Error ? err.message : 'Server Error', undefined, false);

  if (error.statusCode >= 500) {
    logger.error(`[${req.method}] ${req.originalUrl} failed: ${error.message}`, {
      stack: err instanceof Error ? err.stack : undefined,
    });
  } else {
    logger.warn(`[${req.method}] ${req.originalUrl} - ${error.statusCode}: ${error.message}`);
  }

  if (res.headersSent) {
    return next(err);
  }

  res.status(error.statusCode).json({
    success: false,
    error: error.message || 'Server Error',
    ...(error.details !== undefined ? { details: error.details } : {}),
    ...(appConfig.isProduction || !(err instanceof Error) ? {} : { stack: err.stack }),
  });
};

export const notFound = (req: Request, res: Response, next: NextFunction) => {
  next(new ApiError(404, `Not Found - ${req.originalUrl}`));
};
