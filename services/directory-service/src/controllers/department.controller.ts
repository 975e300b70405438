import { Request, Response } from 'express';
import { asyncHandler } from '@campus-portal/shared/utils/asyncHandler';
import { successResponse } from '@campus-portal/shared/utils/responseBuilder';
import '@campus-portal/shared/types/express';
import type { DepartmentService } from '../services/department.service';
import {
  assignCoordinatorSchema,
  createDepartmentSchema,
  departmentRefParamsSchema,
} from '../schemas/directory.schema';

export class DepartmentController {
  constructor(private readonly departmentService: DepartmentService) {}

  listDepartments = asyncHandler(async (_req: Request, res: Response) => {
    const departments = await this.departmentService.listDepartments();
    return successResponse(res, {
      message: 'Departments fetched successfully',
      data: { items: departments },
    });
  });

  getDepartment = asyncHandler(async (req: Request, res: Response) => {
    const { id } = departmentRefParamsSchema.parse(req.params);
    const detail = await this.departmentService.departmentDetail(id);
    return successResponse(res, {
      message: 'Department fetched successfully',
      data: detail,
    });
  });

  createDepartment = asyncHandler(async (req: Request, res: Response) => {
    const body = createDepartmentSchema.parse(req.body);
    const department = await this.departmentService.createDepartment(body);
    return successResponse(res, {
      statusCode: 201,
      message: 'Department created successfully',
      data: department,
    });
  });

  listCoordinators = asyncHandler(async (req: Request, res: Response) => {
    const { id } = departmentRefParamsSchema.parse(req.params);
    const coordinators = await this.departmentService.listCoordinators(id);
    return successResponse(res, {
      message: 'Coordinators fetched successfully',
      data: { items: coordinators },
    });
  });

  assignCoordinator = asyncHandler(async (req: Request, res: Response) => {
    const body = assignCoordinatorSchema.parse(req.body);
    const coordinator = await this.departmentService.assignCoordinator(body);
    return successResponse(res, {
      statusCode: 201,
      message: 'Coordinator assigned successfully',
      data: coordinator,
    });
  });
}
