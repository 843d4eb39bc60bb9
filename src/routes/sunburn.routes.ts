import { Router } from 'express';
import { SunburnController } from '@/controllers/sunburn.controller';
import { validateSunburnRequest } from '@/middleware/validation.middleware';
import { asyncHandler } from '@/middleware/error.middleware';

export const createSunburnRoutes = (sunburnController: SunburnController) => {
  const sunburnRoutes = Router();
  sunburnRoutes.get('/skin-types', sunburnController.listSkinTypes.bind(sunburnController));
  sunburnRoutes.post(
    '/sunburn-risk',
    validateSunburnRequest,
    asyncHandler(sunburnController.getAssessment.bind(sunburnController)),
  );
  sunburnRoutes.post(
    '/sunburn-risk/export',
    validateSunburnRequest,
    asyncHandler(sunburnController.exportCsv.bind(sunburnController)),
  );
  return sunburnRoutes;
};
