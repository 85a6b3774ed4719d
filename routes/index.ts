// routes/index.ts
import express from 'express';
import type { RequestHandler } from 'express';
import type { AppServices } from '../services/container';

// Controllers
import { createResearchController } from '../controllers/researchController';
import { createPostController } from '../controllers/postController';
import { createCacheController } from '../controllers/cacheController';

// Routes
import { createResearchRoutes } from './researchRoutes';
import { createPostRoutes } from './postRoutes';
import { createCacheRoutes } from './cacheRoutes';

export const createApiRouter = (services: AppServices, generationLimiter: RequestHandler) => {
    const router = express.Router();

    // --- 1. Research Stage ---
    router.use('/research', createResearchRoutes(createResearchController(services.researchService), generationLimiter));

    // --- 2. Content Stage ---
    router.use('/posts', createPostRoutes(createPostController(services.contentService), generationLimiter));

    // --- 3. Cache Administration ---
    router.use('/cache', createCacheRoutes(createCacheController(services.researchService)));

    // --- 4. API 404 Handler ---
    // Catches any request that didn't match the routes above
    router.use('*', (req, res) => {
        res.status(404).json({
            success: false,
            message: "API Endpoint Not Found",
            path: req.originalUrl
        });
    });

    return router;
};
