import { Request, Response } from 'express';
import { asyncHandler } from '@campus-portal/shared/utils/asyncHandler';
import { successResponse } from '@campus-portal/shared/utils/responseBuilder';
import { getCaller } from '@campus-portal/shared/middlewares/authMiddleware';
import '@campus-portal/shared/types/express';
import type { ModerationService } from '../services/moderation.service';
import {
  materialIdParamsSchema,
  moderationActionSchema,
  moderationQueueQuerySchema,
} from '../schemas/material.schema';

export class ModerationController {
  constructor(private readonly moderationService: ModerationService) {}

  listQueue = asyncHandler(async (req: Request, res: Response) => {
    const query = moderationQueueQuerySchema.parse(req.query);
    const materials = await this.moderationService.moderationQueue(getCaller(req), query);

    return successResponse(res, {
      message: 'Moderation queue fetched successfully',
      data: { items: materials, status: query.status, department: query.department ?? null },
    });
  });

  getDetail = asyncHandler(async (req: Request, res: Response) => {
    const { id } = materialIdParamsSchema.parse(req.params);
    const detail = await this.moderationService.moderationDetail(getCaller(req), id);

    return successResponse(res, {
      message: 'Moderation detail fetched successfully',
      data: detail,
    });
  });

  /**
   * Verifier access is checked before the form is read; the action is validated
   * before the workflow runs
   */
  applyAction = asyncHandler(async (req: Request, res: Response) => {
    const caller = getCaller(req);
    const { id } = materialIdParamsSchema.parse(req.params);
    await this.moderationService.authorize(caller);
    const { action, reason } = moderationActionSchema.parse(req.body);
    const material = await this.moderationService.applyModerationAction(caller, id, action, reason);

    return successResponse(res, {
      message: `Moderation action "${action}" applied`,
      data: material,
    });
  });
}
