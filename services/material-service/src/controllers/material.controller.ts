import { Request, Response } from 'express';
import { asyncHandler } from '@campus-portal/shared/utils/asyncHandler';
import { successResponse } from '@campus-portal/shared/utils/responseBuilder';
import { getCaller, requireCaller } from '@campus-portal/shared/middlewares/authMiddleware';
import '@campus-portal/shared/types/express';
import type { StudyMaterialService } from '../services/studyMaterial.service';
import {
  materialIdParamsSchema,
  materialListQuerySchema,
  uploadMaterialSchema,
} from '../schemas/material.schema';

export class MaterialController {
  constructor(private readonly materialService: StudyMaterialService) {}

  listMaterials = asyncHandler(async (req: Request, res: Response) => {
    const { department, semester, year, limit } = materialListQuerySchema.parse(req.query);
    const materials = await this.materialService.listMaterials(
      getCaller(req),
      { department, semester, year },
      limit
    );

    return successResponse(res, {
      message: 'Study materials fetched successfully',
      data: { items: materials, count: materials.length },
    });
  });

  recentMaterials = asyncHandler(async (req: Request, res: Response) => {
    const materials = await this.materialService.recentMaterials(getCaller(req));
    return successResponse(res, {
      message: 'Recent study materials fetched successfully',
      data: { items: materials },
    });
  });

  uploadMaterial = asyncHandler(async (req: Request, res: Response) => {
    const caller = requireCaller(req);
    const body = uploadMaterialSchema.parse(req.body);
    const material = await this.materialService.uploadMaterial(caller, body);

    return successResponse(res, {
      statusCode: 201,
      message: 'Study material uploaded and awaiting verification',
      data: material,
    });
  });

  getMaterial = asyncHandler(async (req: Request, res: Response) => {
    const { id } = materialIdParamsSchema.parse(req.params);
    const detail = await this.materialService.materialDetail(getCaller(req), id);

    return successResponse(res, {
      message: 'Study material fetched successfully',
      data: detail,
    });
  });

  downloadMaterial = asyncHandler(async (req: Request, res: Response) => {
    const { id } = materialIdParamsSchema.parse(req.params);
    const target = await this.materialService.downloadMaterial(getCaller(req), id);
    res.redirect(302, target);
  });

  toggleFavorite = asyncHandler(async (req: Request, res: Response) => {
    const caller = requireCaller(req);
    const { id } = materialIdParamsSchema.parse(req.params);
    const result = await this.materialService.toggleFavorite(caller, id);

    return successResponse(res, {
      message: result.favorited ? 'Added to favorites' : 'Removed from favorites',
      data: result,
    });
  });
}
