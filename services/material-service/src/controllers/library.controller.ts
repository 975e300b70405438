import { Request, Response } from 'express';
import { asyncHandler } from '@campus-portal/shared/utils/asyncHandler';
import { successResponse } from '@campus-portal/shared/utils/responseBuilder';
import { requireCaller } from '@campus-portal/shared/middlewares/authMiddleware';
import '@campus-portal/shared/types/express';
import type { LibraryService } from '../services/library.service';

export class LibraryController {
  constructor(private readonly libraryService: LibraryService) {}

  getLibrary = asyncHandler(async (req: Request, res: Response) => {
    const library = await this.libraryService.library(requireCaller(req));
    return successResponse(res, {
      message: 'Library fetched successfully',
      data: library,
    });
  });
}
