import rateLimit, { RateLimitRequestHandler } from 'express-rate-limit';
import { Request, Response, NextFunction } from 'express';
import { apiConfig } from '../config';
import { ApiError } from './errorHandler';

const limitExceeded = (message: string) => (req: Request, res: Response, next: NextFunction) => {
  next(new ApiError(429, message));
};

// Read endpoints (lenient)
export const createApiLimiter = (): RateLimitRequestHandler =>
  rateLimit({
    windowMs: apiConfig.rateLimit.windowMs,
    limit: apiConfig.rateLimit.max,
    standardHeaders: true,
    legacyHeaders: false,
    handler: limitExceeded('Too many requests, please try again later'),
  });

// A reload re-fetches every document of a repository
export const createReloadLimiter = (): RateLimitRequestHandler =>
  rateLimit({
    windowMs: apiConfig.rateLimit.windowMs,
    limit: apiConfig.rateLimit.reloadMax,
    standardHeaders: true,
    legacyHeaders: false,
    handler: limitExceeded('Too many reload requests, please try again later'),
  });
