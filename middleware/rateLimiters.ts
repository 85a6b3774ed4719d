// middleware/rateLimiters.ts
import rateLimit from 'express-rate-limit';
import { Request, Response, NextFunction } from 'express';
import logger from '../utils/logger';

export interface RateLimitSettings {
    windowMs: number;
    maxApi: number;
    maxGeneration: number;
}

type LimiterType = 'API' | 'GENERATION';

const keyGenerator = (req: Request): string => req.ip || 'unknown-ip';

const createLimiter = (windowMs: number, maxRequests: number, type: LimiterType) => {
    const message = {
        status: 'error',
        message: type === 'API'
            ? 'Too many requests, please try again later.'
            : 'Generation limit reached. Please wait before generating more posts.'
    };

    return rateLimit({
        windowMs,
        limit: maxRequests,
        standardHeaders: true,
        legacyHeaders: false,
        keyGenerator,
        message,
        skipFailedRequests: true,
        handler: (req: Request, res: Response, _next: NextFunction, options) => {
            logger.warn(`Rate Limit Exceeded (${type}): ${keyGenerator(req)}`);
            res.status(options.statusCode).send(options.message);
        },
    });
};

/**
 * In-memory limiters, one set per app instance.
 * Every research or post operation can cost several completion calls,
 * so those routes also get the tighter generation limiter.
 */
export const createRateLimiters = (settings: RateLimitSettings) => ({
    apiLimiter: createLimiter(settings.windowMs, settings.maxApi, 'API'),
    generationLimiter: createLimiter(settings.windowMs, settings.maxGeneration, 'GENERATION'),
});
