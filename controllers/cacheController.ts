// controllers/cacheController.ts
import { Request, Response } from 'express';
import asyncHandler from '../utils/asyncHandler';
import schemas from '../utils/validationSchemas';
import logger from '../utils/logger';
import type ResearchService from '../services/researchService';

export const createCacheController = (researchService: ResearchService) => ({
  // GET /cache/stats
  getStats: asyncHandler(async (_req: Request, res: Response) => {
    const stats = await researchService.cacheStats();

    res.status(200).json({
      status: 'success',
      data: { stats }
    });
  }),

  // DELETE /cache
  invalidate: asyncHandler(async (req: Request, res: Response) => {
    const { body } = schemas.invalidateCache.parse({ body: req.body });
    const removed = await researchService.invalidate(body.topic, body.researchType);

    res.status(200).json({
      status: 'success',
      data: { removed }
    });
  }),

  // DELETE /cache/all
  clearAll: asyncHandler(async (req: Request, res: Response) => {
    const cleared = await researchService.clearCache();
    logger.info(`🧹 Cache cleared via API by ${req.ip || 'unknown-ip'} (${cleared} entries)`);

    res.status(200).json({
      status: 'success',
      data: { cleared }
    });
  })
});

export type CacheController = ReturnType<typeof createCacheController>;
