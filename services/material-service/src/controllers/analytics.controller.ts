import { Request, Response } from 'express';
import { asyncHandler } from '@campus-portal/shared/utils/asyncHandler';
import { successResponse } from '@campus-portal/shared/utils/responseBuilder';
import { getCaller } from '@campus-portal/shared/middlewares/authMiddleware';
import '@campus-portal/shared/types/express';
import type { AnalyticsService } from '../services/analytics.service';

export class AnalyticsController {
  constructor(private readonly analyticsService: AnalyticsService) {}

  topMaterials = asyncHandler(async (req: Request, res: Response) => {
    const materials = await this.analyticsService.topMaterials(getCaller(req));
    return successResponse(res, {
      message: 'Top materials fetched successfully',
      data: { items: materials },
    });
  });

  searchTerms = asyncHandler(async (_req: Request, res: Response) => {
    const terms = await this.analyticsService.searchTerms();
    return successResponse(res, {
      message: 'Search terms fetched successfully',
      data: { items: terms },
    });
  });
}
