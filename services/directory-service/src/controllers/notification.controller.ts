import { Request, Response } from 'express';
import { asyncHandler } from '@campus-portal/shared/utils/asyncHandler';
import { successResponse } from '@campus-portal/shared/utils/responseBuilder';
import { requireCaller } from '@campus-portal/shared/middlewares/authMiddleware';
import '@campus-portal/shared/types/express';
import type { NotificationService } from '../services/notification.service';
import {
  createNotificationSchema,
  notificationListQuerySchema,
  notificationStatusSchema,
  uuidParamsSchema,
} from '../schemas/directory.schema';

export class NotificationController {
  constructor(private readonly notificationService: NotificationService) {}

  createNotification = asyncHandler(async (req: Request, res: Response) => {
    const caller = requireCaller(req);
    const body = createNotificationSchema.parse(req.body);
    const notification = await this.notificationService.createNotification(caller, body);
    return successResponse(res, {
      statusCode: 201,
      message: 'Notification scheduled successfully',
      data: notification,
    });
  });

  listNotifications = asyncHandler(async (req: Request, res: Response) => {
    const filters = notificationListQuerySchema.parse(req.query);
    const notifications = await this.notificationService.listNotifications(filters);
    return successResponse(res, {
      message: 'Notifications fetched successfully',
      data: { items: notifications },
    });
  });

  dueNotifications = asyncHandler(async (_req: Request, res: Response) => {
    const notifications = await this.notificationService.dueNotifications();
    return successResponse(res, {
      message: 'Due notifications fetched successfully',
      data: { items: notifications },
    });
  });

  updateStatus = asyncHandler(async (req: Request, res: Response) => {
    const { id } = uuidParamsSchema.parse(req.params);
    const { status } = notificationStatusSchema.parse(req.body);
    const notification = await this.notificationService.markStatus(id, status);
    return successResponse(res, {
      message: `Notification marked as ${status}`,
      data: notification,
    });
  });
}
