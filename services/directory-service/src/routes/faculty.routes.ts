import { Router } from 'express';
import { requireStaff } from '@campus-portal/shared/middlewares/authMiddleware';
import type { FacultyController } from '../controllers/faculty.controller';

export function createFacultyRoutes(facultyController: FacultyController): Router {
  const router = Router();

  router.get('/faculty', facultyController.listFaculty);
  router.post('/faculty', requireStaff, facultyController.createFaculty);
  router.get('/faculty/:id', facultyController.getFaculty);

  return router;
}
