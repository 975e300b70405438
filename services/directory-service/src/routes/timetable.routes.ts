import { Router } from 'express';
import { requireStaff } from '@campus-portal/shared/middlewares/authMiddleware';
import type { TimetableController } from '../controllers/timetable.controller';

export function createTimetableRoutes(timetableController: TimetableController): Router {
  const router = Router();

  router.get('/timetable', timetableController.listEntries);
  router.post('/timetable', requireStaff, timetableController.createEntry);
  router.get('/timetable/departments/:id', timetableController.departmentTimetable);

  return router;
}
