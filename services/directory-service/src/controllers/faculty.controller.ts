import { Request, Response } from 'express';
import { asyncHandler } from '@campus-portal/shared/utils/asyncHandler';
import { successResponse } from '@campus-portal/shared/utils/responseBuilder';
import type { FacultyService } from '../services/faculty.service';
import { createFacultySchema, facultyListQuerySchema, uuidParamsSchema } from '../schemas/directory.schema';

export class FacultyController {
  constructor(private readonly facultyService: FacultyService) {}

  listFaculty = asyncHandler(async (req: Request, res: Response) => {
    const { department } = facultyListQuerySchema.parse(req.query);
    const faculty = await this.facultyService.listFaculty(department);
    return successResponse(res, {
      message: 'Faculty fetched successfully',
      data: { items: faculty },
    });
  });

  getFaculty = asyncHandler(async (req: Request, res: Response) => {
    const { id } = uuidParamsSchema.parse(req.params);
    const member = await this.facultyService.facultyDetail(id);
    return successResponse(res, {
      message: 'Faculty member fetched successfully',
      data: member,
    });
  });

  createFaculty = asyncHandler(async (req: Request, res: Response) => {
    const body = createFacultySchema.parse(req.body);
    const member = await this.facultyService.createFaculty(body);
    return successResponse(res, {
      statusCode: 201,
      message: 'Faculty member created successfully',
      data: member,
    });
  });
}
