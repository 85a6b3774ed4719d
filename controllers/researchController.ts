// controllers/researchController.ts
import { Request, Response } from 'express';
import asyncHandler from '../utils/asyncHandler';
import schemas from '../utils/validationSchemas';
import { RESEARCH_TYPES } from '../utils/constants';
import type ResearchService from '../services/researchService';

export const createResearchController = (researchService: ResearchService) => ({
  // POST /research
  runResearch: asyncHandler(async (req: Request, res: Response) => {
    const { body } = schemas.research.parse({ body: req.body });
    const research = await researchService.research(body.topic, body.researchType);

    res.status(200).json({
      status: 'success',
      data: { research }
    });
  }),

  // POST /research/angles
  suggestAngles: asyncHandler(async (req: Request, res: Response) => {
    const { body } = schemas.angles.parse({ body: req.body });
    const angles = await researchService.suggestAngles(body.topic, body.summary);

    res.status(200).json({
      status: 'success',
      data: { angles }
    });
  }),

  // GET /research/types
  getResearchTypes: (_req: Request, res: Response) => {
    res.status(200).json({
      status: 'success',
      data: { types: RESEARCH_TYPES }
    });
  }
});

export type ResearchController = ReturnType<typeof createResearchController>;
