import { Router } from 'express';
import { requireStaff } from '@campus-portal/shared/middlewares/authMiddleware';
import type { NotificationController } from '../controllers/notification.controller';

export function createNotificationRoutes(notificationController: NotificationController): Router {
  const router = Router();

  // Scheduling metadata is an administrative surface
  router.use('/notifications', requireStaff);

  router.get('/notifications', notificationController.listNotifications);
  router.post('/notifications', notificationController.createNotification);
  router.get('/notifications/due', notificationController.dueNotifications);
  router.patch('/notifications/:id/status', notificationController.updateStatus);

  return router;
}
