/**
 * Material Service Express App
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
import { CoordinatorRepository, type UserRoleDirectory } from './models/coordinator.model';
import { DepartmentRepository, type DepartmentLookup } from './models/department.model';
import { FavoriteRepository, type FavoriteStore } from './models/favorite.model';
import { RecentViewRepository, type RecentViewStore } from './models/recentView.model';
import { SearchQueryLogRepository, type SearchLogStore } from './models/searchQueryLog.model';
import { StudyMaterialRepository, type StudyMaterialStore } from './models/studyMaterial.model';
import { UploadAuditRepository, type UploadAuditStore } from './models/uploadAudit.model';
import { AccessPolicy } from './services/accessPolicy.service';
import { AnalyticsService } from './services/analytics.service';
import { EngagementService } from './services/engagement.service';
import { LibraryService } from './services/library.service';
import { ModerationService } from './services/moderation.service';
import { SearchLogService } from './services/searchLog.service';
import { StudyMaterialService } from './services/studyMaterial.service';
import { AnalyticsController } from './controllers/analytics.controller';
import { LibraryController } from './controllers/library.controller';
import { MaterialController } from './controllers/material.controller';
import { ModerationController } from './controllers/moderation.controller';
import { createEngagementRoutes } from './routes/engagement.routes';
import { createMaterialRoutes } from './routes/material.routes';
import { createModerationRoutes } from './routes/moderation.routes';

export interface MaterialStores {
  materials: StudyMaterialStore;
  audits: UploadAuditStore;
  departments: DepartmentLookup;
  roles: UserRoleDirectory;
  favorites: FavoriteStore;
  recentViews: RecentViewStore;
  searchLogs: SearchLogStore;
}

export interface MaterialAppOptions {
  stores: MaterialStores;
  getPool?: () => Pool;
  clock?: () => Date;
}

export function createPostgresStores(pool: Pool): MaterialStores {
  return {
    materials: new StudyMaterialRepository(pool),
    audits: new UploadAuditRepository(pool),
    departments: new DepartmentRepository(pool),
    roles: new CoordinatorRepository(pool),
    favorites: new FavoriteRepository(pool),
    recentViews: new RecentViewRepository(pool),
    searchLogs: new SearchQueryLogRepository(pool),
  };
}

export function createApp(options: MaterialAppOptions): Application {
  const { stores } = options;
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
    serviceName: 'material-service',
    getPostgresPool: options.getPool,
  });
  app.get('/health', healthHandler);
  app.get('/ready', readyHandler);

  app.use(attachCallerContext);

  // Services
  const policy = new AccessPolicy(stores.roles);
  const searchLogService = new SearchLogService(stores.searchLogs);
  const engagementService = new EngagementService(stores.materials, stores.favorites, stores.recentViews);
  const materialService = new StudyMaterialService(
    stores.materials,
    stores.departments,
    stores.favorites,
    engagementService,
    searchLogService,
    policy
  );
  const moderationService = new ModerationService(
    stores.materials,
    stores.audits,
    stores.departments,
    policy,
    options.clock
  );
  const libraryService = new LibraryService(stores.favorites, stores.recentViews, policy);
  const analyticsService = new AnalyticsService(engagementService, searchLogService, policy);

  // Routes
  app.use('/api', createMaterialRoutes(new MaterialController(materialService)));
  app.use('/api', createModerationRoutes(new ModerationController(moderationService)));
  app.use(
    '/api',
    createEngagementRoutes(new LibraryController(libraryService), new AnalyticsController(analyticsService))
  );

  app.use(globalErrorHandler);

  return app;
}
