// middleware/validate.ts
import { Request, Response, NextFunction } from 'express';
import { ZodError, ZodTypeAny } from 'zod';
import logger from '../utils/logger';

export const formatZodIssues = (error: ZodError) =>
  error.errors.map((err) => ({
    field: err.path.join('.'),
    message: err.message
  }));

/**
 * Validates the request against a Zod Schema shaped { body?, query?, params? }.
 */
const validate = (schema: ZodTypeAny) => async (req: Request, res: Response, next: NextFunction) => {
  try {
    await schema.parseAsync({
      body: req.body,
      query: req.query,
      params: req.params,
    });

    return next();
  } catch (error) {
    if (error instanceof ZodError) {
      logger.warn(`🛡️ Validation Failed [${req.method} ${req.originalUrl}]: ${error.errors.map(e => e.message).join(', ')}`);

      return res.status(400).json({
        status: 'error',
        message: 'Invalid input data',
        errors: formatZodIssues(error)
      });
    }
    return next(error);
  }
};

export default validate;
