// app.ts
import express, { Request, Response, NextFunction } from 'express';
import cors from 'cors';
import compression from 'compression';
import helmet from 'helmet';
import hpp from 'hpp';

import logger from './utils/logger';
import redisClient from './utils/redisClient';
import type { AppConfig } from './utils/config';
import type { AppServices } from './services/container';

import { errorHandler } from './middleware/errorMiddleware';
import { createRateLimiters } from './middleware/rateLimiters';
import { createApiRouter } from './routes/index';

type AppSettings = Pick<AppConfig, 'corsOrigins' | 'rateLimit' | 'cache'>;

export const createApp = (services: AppServices, settings: AppSettings) => {
    const app = express();

    // --- 1. Request Logging ---
    app.use((req: Request, _res: Response, next: NextFunction) => {
        if (req.url !== '/health' && req.url !== '/ping') {
            logger.http(`${req.method} ${req.url}`);
        }
        next();
    });

    // --- 2. Security Middleware ---
    // SECURITY: Hide Express signature
    app.disable('x-powered-by');
    app.use(helmet());
    app.use(compression());
    app.use(hpp());

    // --- 3. CORS Configuration ---
    app.use(cors({
        origin: settings.corsOrigins,
        methods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
        allowedHeaders: ['Content-Type', 'Authorization'],
    }));

    app.use(express.json({ limit: '200kb' }));

    // --- 4. System Routes ---
    app.get('/', (_req: Request, res: Response) => { res.status(200).send('Research Post Backend Running'); });

    app.get('/ping', (_req: Request, res: Response) => {
        res.status(200).send('OK');
    });

    app.get('/health', (_req: Request, res: Response) => {
        // Redis only matters when it holds the cache
        const usesRedis = settings.cache.enabled && settings.cache.backend === 'redis';
        const redisStatus = usesRedis ? (redisClient.isReady() ? 'UP' : 'DOWN') : 'UNUSED';
        const status = redisStatus === 'DOWN' ? 503 : 200;

        res.status(status).json({
            status: status === 200 ? 'OK' : 'DEGRADED',
            cache: services.cacheStore.name,
            redis: redisStatus
        });
    });

    // --- 5. Rate Limiters ---
    const { apiLimiter, generationLimiter } = createRateLimiters(settings.rateLimit);
    app.use('/api/', apiLimiter);

    // --- 6. Mount Routes ---
    const apiRouter = createApiRouter(services, generationLimiter);
    app.use('/api/v1', apiRouter);
    // Fallback
    app.use('/api', apiRouter);

    // --- 7. Error Handling ---
    app.use(errorHandler);

    return app;
};
