// generalRateLimiter.ts

import { Request } from 'express';
import rateLimit, { type RateLimitRequestHandler } from 'express-rate-limit';

import { getEnvVariable } from 'App/config/config';

const FIFTEEN_MINUTES = 15 * 60 * 1000;

export interface LimiterOptions {
  windowMs: number;
  limit: number;
  /** Reported to the client in the 429 body. */
  message: string;
}

export const createLimiter = ({ windowMs, limit, message }: LimiterOptions): RateLimitRequestHandler =>
  rateLimit({
    windowMs,
    limit,
    keyGenerator: (req: Request) => req.ip || 'unknown',
    standardHeaders: true,
    legacyHeaders: false,
    message: { code: 'TOO_MANY_REQUESTS', message },
  });

/** Every API request. */
export const generalLimiter = createLimiter({
  windowMs: FIFTEEN_MINUTES,
  limit: Number(getEnvVariable('RATE_LIMIT_GENERAL', '300')),
  message: 'Too many requests, please try again later.',
});

/** Sweep starts, each of which spawns simulator processes. */
export const runStartLimiter = createLimiter({
  windowMs: FIFTEEN_MINUTES,
  limit: Number(getEnvVariable('RATE_LIMIT_RUN_START', '20')),
  message: 'Too many sweeps started, wait for running ones to finish.',
});
