// controllers/postController.ts
import { Request, Response } from 'express';
import asyncHandler from '../utils/asyncHandler';
import schemas from '../utils/validationSchemas';
import type ContentService from '../services/contentService';

export const createPostController = (contentService: ContentService) => ({
  // GET /posts/styles
  getStyles: (_req: Request, res: Response) => {
    res.status(200).json({
      status: 'success',
      data: { styles: contentService.listStyles() }
    });
  },

  // POST /posts
  generatePost: asyncHandler(async (req: Request, res: Response) => {
    const { body } = schemas.generatePost.parse({ body: req.body });
    const post = await contentService.generate(body.topic, body.summary, body.style, body.angle);

    res.status(201).json({
      status: 'success',
      data: { post }
    });
  }),

  // POST /posts/improve-hook
  improveHook: asyncHandler(async (req: Request, res: Response) => {
    const { body } = schemas.improveHook.parse({ body: req.body });
    const post = await contentService.improveHook(body.post, body.topic);

    res.status(200).json({
      status: 'success',
      data: { post }
    });
  }),

  // POST /posts/regenerate
  regeneratePost: asyncHandler(async (req: Request, res: Response) => {
    const { body } = schemas.regeneratePost.parse({ body: req.body });
    const post = await contentService.regenerate(body.topic, body.summary, body.style, body.previousPost);

    res.status(201).json({
      status: 'success',
      data: { post }
    });
  })
});

export type PostController = ReturnType<typeof createPostController>;
