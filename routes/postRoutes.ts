// routes/postRoutes.ts
import express from 'express';
import validate from '../middleware/validate';
import schemas from '../utils/validationSchemas';
import type { RequestHandler } from 'express';
import type { PostController } from '../controllers/postController';

export const createPostRoutes = (controller: PostController, generationLimiter: RequestHandler) => {
    const router = express.Router();

    router.get('/styles', controller.getStyles);

    // Every route below spends completion calls
    router.use(generationLimiter);

    router.post('/', validate(schemas.generatePost), controller.generatePost);
    router.post('/improve-hook', validate(schemas.improveHook), controller.improveHook);
    router.post('/regenerate', validate(schemas.regeneratePost), controller.regeneratePost);

    return router;
};
