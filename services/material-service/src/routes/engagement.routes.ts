import { Router } from 'express';
import { requireAuth, requireStaff } from '@campus-portal/shared/middlewares/authMiddleware';
import type { LibraryController } from '../controllers/library.controller';
import type { AnalyticsController } from '../controllers/analytics.controller';

export function createEngagementRoutes(
  libraryController: LibraryController,
  analyticsController: AnalyticsController
): Router {
  const router = Router();

  router.get('/library', requireAuth, libraryController.getLibrary);

  router.get('/analytics/top-materials', analyticsController.topMaterials);
  router.get('/analytics/search-terms', requireStaff, analyticsController.searchTerms);

  return router;
}
