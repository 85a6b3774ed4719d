// routes/researchRoutes.ts
import express from 'express';
import validate from '../middleware/validate';
import schemas from '../utils/validationSchemas';
import type { RequestHandler } from 'express';
import type { ResearchController } from '../controllers/researchController';

export const createResearchRoutes = (controller: ResearchController, generationLimiter: RequestHandler) => {
    const router = express.Router();

    // 1. Research types offered to clients
    router.get('/types', controller.getResearchTypes);

    // 2. Research (cache first, then search + synthesis)
    router.post('/', generationLimiter, validate(schemas.research), controller.runResearch);

    // 3. Post angles for a finished research summary
    router.post('/angles', generationLimiter, validate(schemas.angles), controller.suggestAngles);

    return router;
};
