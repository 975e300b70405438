/**
 * Notification Service - Business Logic
 * Records what should be pushed and when; nothing here sends anything
 */

import { AppError, isForeignKeyViolation } from '@campus-portal/shared/config/errorHandler';
import logger from '@campus-portal/shared/config/logger';
import { ErrorMessages } from '@campus-portal/shared/utils/errorMessages';
import type { AuthenticatedCaller } from '@campus-portal/shared/types/caller';
import type { DepartmentStore } from '../models/department.model';
import type { Notification, NotificationStore, SentStatus } from '../models/notification.model';
import type { CreateNotificationBody } from '../schemas/directory.schema';
import { requireDepartment } from './department.service';

export interface NotificationFilters {
  department?: string;
  status?: SentStatus;
}

export class NotificationService {
  constructor(
    private readonly notifications: NotificationStore,
    private readonly departments: DepartmentStore,
    private readonly clock: () => Date = () => new Date()
  ) {}

  async createNotification(caller: AuthenticatedCaller, input: CreateNotificationBody): Promise<Notification> {
    const department = input.department ? await requireDepartment(this.departments, input.department) : null;

    try {
      const notification = await this.notifications.create({
        title: input.title,
        body: input.body,
        departmentId: department?.id ?? null,
        pushTo: input.pushTo,
        createdBy: caller.userId,
        scheduledFor: input.scheduledFor ?? null,
      });

      logger.info('Notification scheduled', {
        service: 'directory-service',
        notificationId: notification.id,
        departmentId: notification.departmentId,
        pushTo: notification.pushTo,
        scheduledFor: notification.scheduledFor?.toISOString() ?? null,
      });
      return notification;
    } catch (error) {
      if (isForeignKeyViolation(error)) {
        throw new AppError(ErrorMessages.USER_NOT_FOUND, 404, 'NOT_FOUND');
      }
      throw error;
    }
  }

  /**
   * An unknown department filter is ignored
   */
  async listNotifications(filters: NotificationFilters): Promise<Notification[]> {
    const department = filters.department ? await this.departments.resolve(filters.department) : null;
    return this.notifications.list({ departmentId: department?.id, status: filters.status });
  }

  async dueNotifications(): Promise<Notification[]> {
    return this.notifications.listDue(this.clock());
  }

  async markStatus(id: string, status: SentStatus): Promise<Notification> {
    const notification = await this.notifications.updateStatus(id, status);
    if (!notification) {
      throw new AppError(ErrorMessages.NOTIFICATION_NOT_FOUND, 404, 'NOT_FOUND');
    }

    logger.info('Notification status updated', {
      service: 'directory-service',
      notificationId: id,
      sentStatus: status,
    });
    return notification;
  }
}
