// routes/cacheRoutes.ts
import express from 'express';
import validate from '../middleware/validate';
import schemas from '../utils/validationSchemas';
import type { CacheController } from '../controllers/cacheController';

export const createCacheRoutes = (controller: CacheController) => {
    const router = express.Router();

    router.get('/stats', controller.getStats);

    // '/all' before '/' so the bulk clear is never read as a keyed delete
    router.delete('/all', controller.clearAll);
    router.delete('/', validate(schemas.invalidateCache), controller.invalidate);

    return router;
};
