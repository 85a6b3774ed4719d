// utils/AppError.ts

/**
 * Errors we expect and know how to report (bad input, missing resources,
 * misconfiguration). The error middleware turns these into JSON responses.
 */
class AppError extends Error {
  public readonly statusCode: number;
  public readonly status: 'fail' | 'error';
  public readonly isOperational: boolean;

  constructor(message: string, statusCode: number = 500, isOperational: boolean = true) {
    super(message);
    this.name = 'AppError';
    this.statusCode = statusCode;
    this.status = statusCode >= 400 && statusCode < 500 ? 'fail' : 'error';
    this.isOperational = isOperational;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * A required credential or setting is missing. There is no fallback for this,
 * so it is surfaced to the caller at the point of use.
 */
export class ConfigurationError extends AppError {
  constructor(message: string) {
    super(message, 503, false);
    this.name = 'ConfigurationError';
  }
}

export default AppError;
