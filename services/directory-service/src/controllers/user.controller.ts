import { Request, Response } from 'express';
import { asyncHandler } from '@campus-portal/shared/utils/asyncHandler';
import { successResponse } from '@campus-portal/shared/utils/responseBuilder';
import { requireCaller } from '@campus-portal/shared/middlewares/authMiddleware';
import '@campus-portal/shared/types/express';
import type { UserService } from '../services/user.service';
import { createUserSchema, uuidParamsSchema } from '../schemas/directory.schema';

export class UserController {
  constructor(private readonly userService: UserService) {}

  createUser = asyncHandler(async (req: Request, res: Response) => {
    const body = createUserSchema.parse(req.body);
    const user = await this.userService.provisionUser(body);
    return successResponse(res, {
      statusCode: 201,
      message: 'User created successfully',
      data: user,
    });
  });

  getUser = asyncHandler(async (req: Request, res: Response) => {
    const caller = requireCaller(req);
    const { id } = uuidParamsSchema.parse(req.params);
    const user = await this.userService.getUser(caller, id);
    return successResponse(res, {
      message: 'User fetched successfully',
      data: user,
    });
  });
}
