/**
 * Rate Limiter Middleware - KubeQuery Backend
 * Caps paid LLM calls per client IP
 */

import type { NextFunction, Request, Response } from 'express';
import { RateLimiterMemory, RateLimiterRes } from 'rate-limiter-flexible';
import { createError } from '../lib/errors';
import { rateLimitLogger } from '../utils/logger';

export interface RateLimiterOptions {
  name: string;
  points: number;
  /** Seconds */
  duration?: number;
  /** Seconds */
  blockDuration?: number;
}

export interface RateLimit {
  limiter: RateLimiterMemory;
  middleware: (req: Request, res: Response, next: NextFunction) => Promise<void>;
  reset: (key: string) => Promise<void>;
}

const clientKey = (name: string, req: Request): string => `${name}:${req.ip || req.socket.remoteAddress || 'unknown'}`;

export const createRateLimit = (options: RateLimiterOptions): RateLimit => {
  const limiter = new RateLimiterMemory({
    points: options.points,
    duration: options.duration ?? 60,
    blockDuration: options.blockDuration ?? 60,
  });

  const middleware = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    const key = clientKey(options.name, req);

    try {
      const result = await limiter.consume(key);
      res.set({
        'X-RateLimit-Limit': limiter.points.toString(),
        'X-RateLimit-Remaining': result.remainingPoints.toString(),
        'X-RateLimit-Reset': new Date(Date.now() + result.msBeforeNext).toISOString(),
      });
      next();
    } catch (rejection) {
      if (!(rejection instanceof RateLimiterRes)) {
        next(rejection);
        return;
      }

      rateLimitLogger.warn(
        { key, path: req.path, msBeforeNext: rejection.msBeforeNext },
        'Rate limit exceeded'
      );

      const retryAfterMs = rejection.msBeforeNext || 60_000;
      res.set({
        'X-RateLimit-Limit': limiter.points.toString(),
        'X-RateLimit-Remaining': '0',
        'X-RateLimit-Reset': new Date(Date.now() + retryAfterMs).toISOString(),
        'Retry-After': Math.round(retryAfterMs / 1000).toString(),
      });

      next(createError.system.rateLimitExceeded(options.name, limiter.points));
    }
  };

  const reset = async (key: string): Promise<void> => {
    await limiter.delete(key);
    rateLimitLogger.info({ key }, 'Rate limit reset');
  };

  return { limiter, middleware, reset };
};
