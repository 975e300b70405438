import { Router } from 'express';
import { requireAuth, requireStaff } from '@campus-portal/shared/middlewares/authMiddleware';
import type { UserController } from '../controllers/user.controller';

export function createUserRoutes(userController: UserController): Router {
  const router = Router();

  router.post('/users', requireStaff, userController.createUser);
  router.get('/users/:id', requireAuth, userController.getUser);

  return router;
}
