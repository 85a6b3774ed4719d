// middleware/errorMiddleware.ts
import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import logger from '../utils/logger';
import AppError from '../utils/AppError';
import { getErrorMessage } from '../utils/helpers';
import { formatZodIssues } from './validate';

// body-parser attaches an HTTP status and a type to the errors it raises
const getBodyParserStatus = (err: unknown): number | undefined => {
  if (err instanceof Error && 'type' in err && 'status' in err && typeof err.status === 'number') {
    return err.status;
  }
  return undefined;
};

const errorHandler = (err: unknown, req: Request, res: Response, _next: NextFunction) => {
  // 1. Normalize into an AppError
  let error: AppError;
  if (err instanceof AppError) {
    error = err;
  } else if (err instanceof ZodError) {
    logger.warn(`🛡️ Validation Failed [${req.method} ${req.url}]: ${err.errors.map(e => e.message).join(', ')}`);
    return res.status(400).json({
      status: 'error',
      message: 'Invalid input data',
      errors: formatZodIssues(err)
    });
  } else {
    const bodyStatus = getBodyParserStatus(err);
    if (bodyStatus !== undefined) {
      // Malformed JSON (400) or payload over the body limit (413)
      error = new AppError(bodyStatus === 413 ? 'Request body too large' : 'Malformed JSON body', bodyStatus);
    } else {
      error = new AppError(getErrorMessage(err) || 'Internal Server Error', 500, false);
    }
  }

  // 2. Log the Error
  // We log the stack trace if it's not an operational error (meaning it might be a bug)
  if (!error.isOperational) {
    logger.error(`🔥 Unexpected Error [${req.method} ${req.url}]:`);
    logger.error(err);
  } else {
    logger.warn(`⚠️ Operational Error [${req.method} ${req.url}]: ${error.message}`);
  }

  // 3. Send Response
  const stack = err instanceof Error ? err.stack : undefined;
  res.status(error.statusCode).json({
    status: error.status,
    message: error.message,
    // Only show stack in development
    stack: process.env.NODE_ENV === 'development' ? stack : undefined,
  });
};

export { errorHandler };
