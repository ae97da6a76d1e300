import { NextFunction, Request, Response } from 'express';

import { CustomError } from 'App/errors/CustomError';
import { validationErrorType } from 'App/types/errorType';
// --------------------------------------------------------------

/**
 * Global error handling middleware for Express applications.
 * Captures errors thrown in routes and middleware, logs them,
 * and sends a standardized error response to the client.
 *
 * @param err - The error object thrown.
 * @param req - The Express Request object.
 * @param res - The Express Response object.
 * @param next - The next middleware function in the stack.
 */
function errorHandler(
  err: CustomError | Error,
  req: Request,
  res: Response,
  // eslint-disable-next-line @typescript-eslint/no-unused-vars
  next: NextFunction,
): void {
  /**
   * Determine the HTTP status code, error code, message, and details.
   * CustomError carries its own; a malformed JSON body is a client error;
   * anything else is a 500 Internal Server Error.
   */
  let statusCode = 500;
  let code = 'INTERNAL_SERVER_ERROR';
  let message = 'An unexpected error occurred';
  let details: validationErrorType[] | undefined;
  if (err instanceof CustomError) {
    statusCode = err.statusCode;
    code = err.code;
    message = err.message;
    details = err.details;
  } else if (err instanceof SyntaxError) {
    statusCode = 400;
    code = 'INVALID_JSON';
    message = 'Request body is not valid JSON';
  }

  console.error('Error occurred', {
    statusCode,
    code,
    message: err.message,
    method: req.method,
    url: req.originalUrl,
    ip: req.ip,
    stack: err.stack,
  });

  res.status(statusCode).json({
    code,
    message,
    details,
  });
}

export default errorHandler;
