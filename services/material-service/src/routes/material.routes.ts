import { Router } from 'express';
import type { MaterialController } from '../controllers/material.controller';

export function createMaterialRoutes(materialController: MaterialController): Router {
  const router = Router();

  router.get('/materials', materialController.listMaterials);
  router.get('/materials/recent', materialController.recentMaterials);
  router.post('/materials', materialController.uploadMaterial);
  router.get('/materials/:id', materialController.getMaterial);
  router.get('/materials/:id/download', materialController.downloadMaterial);
  router.post('/materials/:id/favorite', materialController.toggleFavorite);

  return router;
}
