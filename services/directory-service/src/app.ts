/**
 * Directory Service Express App
 */

import express, { type Application } from 'express';
import helmet from 'helmet';
import compression from 'compression';
import timeout from 'connect-timeout';
import type { Pool } from 'pg';
import { globalErrorHandler } from '@campus-portal/shared/middlewares/globalErrorHandler';
import { createHealthCheckEndpoints } from '@campus-portal/shared/middlewares/healthChecks';
import { correlationIdMiddleware } from '@campus-portal/shared/middlewares/correlationId';
import { requestLogger } from '@campus-portal/shared/middlewares/requestLogger';
import { attachCallerContext } from '@campus-portal/shared/middlewares/authMiddleware';
import { CoordinatorRepository, type CoordinatorStore } from './models/coordinator.model';
import { DepartmentRepository, type DepartmentStore } from './models/department.model';
import { FacultyRepository, type FacultyStore } from './models/faculty.model';
import { NotificationRepository, type NotificationStore } from './models/notification.model';
import { TimetableRepository, type TimetableStore } from './models/timetable.model';
import { UserRepository, type UserStore } from './models/user.model';
import { DepartmentService } from './services/department.service';
import { FacultyService } from './services/faculty.service';
import { NotificationService } from './services/notification.service';
import { TimetableService } from './services/timetable.service';
import { UserService } from './services/user.service';
import { DepartmentController } from './controllers/department.controller';
import { FacultyController } from './controllers/faculty.controller';
import { NotificationController } from './controllers/notification.controller';
import { TimetableController } from './controllers/timetable.controller';
import { UserController } from './controllers/user.controller';
import { createDepartmentRoutes } from './routes/department.routes';
import { createFacultyRoutes } from './routes/faculty.routes';
import { createNotificationRoutes } from './routes/notification.routes';
import { createTimetableRoutes } from './routes/timetable.routes';
import { createUserRoutes } from './routes/user.routes';

export interface DirectoryStores {
  departments: DepartmentStore;
  faculty: FacultyStore;
  coordinators: CoordinatorStore;
  timetable: TimetableStore;
  notifications: NotificationStore;
  users: UserStore;
}

export interface DirectoryAppOptions {
  stores: DirectoryStores;
  getPool?: () => Pool;
  clock?: () => Date;
}

export function createPostgresStores(pool: Pool): DirectoryStores {
  return {
    departments: new DepartmentRepository(pool),
    faculty: new FacultyRepository(pool),
    coordinators: new CoordinatorRepository(pool),
    timetable: new TimetableRepository(pool),
    notifications: new NotificationRepository(pool),
    users: new UserRepository(pool),
  };
}

export function createApp(options: DirectoryAppOptions): Application {
  const { stores, clock } = options;
  const app: Application = express();

  app.use(helmet());
  app.use(compression());
  app.use(correlationIdMiddleware);
  app.use(requestLogger);

  // Request timeout middleware (30 seconds)
  app.use(timeout('30s'));

  // Timeout handler - must be after timeout middleware
  app.use((req, _res, next) => {
    if (!req.timedout) next();
  });

  app.use(express.json({ limit: '1mb' }));
  app.use(express.urlencoded({ extended: true }));

  const { healthHandler, readyHandler } = createHealthCheckEndpoints({
    serviceName: 'directory-service',
    getPostgresPool: options.getPool,
  });
  app.get('/health', healthHandler);
  app.get('/ready', readyHandler);

  app.use(attachCallerContext);

  // Services
  const departmentService = new DepartmentService(stores.departments, stores.faculty, stores.coordinators);
  const facultyService = new FacultyService(stores.faculty, stores.departments);
  const timetableService = new TimetableService(stores.timetable, stores.departments, clock);
  const notificationService = new NotificationService(stores.notifications, stores.departments, clock);
  const userService = new UserService(stores.users);

  // Routes
  app.use('/api', createDepartmentRoutes(new DepartmentController(departmentService)));
  app.use('/api', createFacultyRoutes(new FacultyController(facultyService)));
  app.use('/api', createTimetableRoutes(new TimetableController(timetableService)));
  app.use('/api', createNotificationRoutes(new NotificationController(notificationService)));
  app.use('/api', createUserRoutes(new UserController(userService)));

  app.use(globalErrorHandler);

  return app;
}
