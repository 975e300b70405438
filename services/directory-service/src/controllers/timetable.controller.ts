import { Request, Response } from 'express';
import { asyncHandler } from '@campus-portal/shared/utils/asyncHandler';
import { successResponse } from '@campus-portal/shared/utils/responseBuilder';
import type { TimetableService } from '../services/timetable.service';
import {
  createTimetableEntrySchema,
  departmentRefParamsSchema,
  departmentTimetableQuerySchema,
  timetableQuerySchema,
} from '../schemas/directory.schema';

export class TimetableController {
  constructor(private readonly timetableService: TimetableService) {}

  listEntries = asyncHandler(async (req: Request, res: Response) => {
    const filters = timetableQuerySchema.parse(req.query);
    const listing = await this.timetableService.listEntries(filters);
    return successResponse(res, {
      message: 'Timetable fetched successfully',
      data: listing,
    });
  });

  departmentTimetable = asyncHandler(async (req: Request, res: Response) => {
    const { id } = departmentRefParamsSchema.parse(req.params);
    const { semester } = departmentTimetableQuerySchema.parse(req.query);
    const entries = await this.timetableService.departmentTimetable(id, semester);
    return successResponse(res, {
      message: 'Department timetable fetched successfully',
      data: { items: entries },
    });
  });

  createEntry = asyncHandler(async (req: Request, res: Response) => {
    const body = createTimetableEntrySchema.parse(req.body);
    const entry = await this.timetableService.createEntry(body);
    return successResponse(res, {
      statusCode: 201,
      message: 'Timetable entry created successfully',
      data: entry,
    });
  });
}
