import { Router } from 'express';
import { requireStaff } from '@campus-portal/shared/middlewares/authMiddleware';
import type { DepartmentController } from '../controllers/department.controller';

export function createDepartmentRoutes(departmentController: DepartmentController): Router {
  const router = Router();

  router.get('/departments', departmentController.listDepartments);
  router.post('/departments', requireStaff, departmentController.createDepartment);
  router.get('/departments/:id', departmentController.getDepartment);
  router.get('/departments/:id/coordinators', departmentController.listCoordinators);
  router.post('/coordinators', requireStaff, departmentController.assignCoordinator);

  return router;
}
