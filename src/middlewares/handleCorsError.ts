import { NextFunction, Request, Response } from 'express';

import { CorsNotAllowedError } from 'App/errors/CustomError';

/**
 * Answers a refused cross-origin request with 403 before the generic error handler,
 * which would log it with a stack trace.
 */
const handleCorsError = (
  err: Error,
  req: Request,
  res: Response,
  next: NextFunction,
) => {
  if (!(err instanceof CorsNotAllowedError)) {
    next(err);
    return;
  }
  console.warn(`[CORS] ${req.method} ${req.originalUrl} refused for origin ${err.origin}`);
  res.status(err.statusCode).json({
    code: err.code,
    message: err.message,
    details: [{ path: 'origin', message: 'not listed in CORS_ORIGINS' }],
  });
};

export default handleCorsError;
