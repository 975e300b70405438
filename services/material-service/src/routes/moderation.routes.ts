import { Router } from 'express';
import type { ModerationController } from '../controllers/moderation.controller';

// Verifier checks live in ModerationService so coordinators are resolved per request
export function createModerationRoutes(moderationController: ModerationController): Router {
  const router = Router();

  router.get('/moderation/materials', moderationController.listQueue);
  router.get('/moderation/materials/:id', moderationController.getDetail);
  router.post('/moderation/materials/:id/actions', moderationController.applyAction);

  return router;
}
