import { AppError, isUniqueViolation } from '@campus-portal/shared/config/errorHandler';
import logger, { logSecurityEvent } from '@campus-portal/shared/config/logger';
import { ErrorMessages } from '@campus-portal/shared/utils/errorMessages';
import { isStaffCaller } from '@campus-portal/shared/middlewares/authMiddleware';
import type { AuthenticatedCaller } from '@campus-portal/shared/types/caller';
import type { User, UserStore } from '../models/user.model';
import type { CreateUserBody } from '../schemas/directory.schema';

export class UserService {
  constructor(private readonly users: UserStore) {}

  async provisionUser(input: CreateUserBody): Promise<User> {
    try {
      const user = await this.users.create({
        email: input.email,
        name: input.name,
        role: input.role,
        phone: input.phone ?? null,
        telegramId: input.telegramId ?? null,
        whatsappNumber: input.whatsappNumber ?? null,
        isStaff: input.isStaff,
        isSuperuser: input.isSuperuser,
      });

      logger.info('User provisioned', { service: 'directory-service', userId: user.id, role: user.role });
      return user;
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new AppError(ErrorMessages.USER_EMAIL_TAKEN, 409, 'CONFLICT');
      }
      throw error;
    }
  }

  /**
   * Users may read their own record; staff may read anyone's
   */
  async getUser(caller: AuthenticatedCaller, id: string): Promise<User> {
    if (caller.userId !== id && !isStaffCaller(caller)) {
      logSecurityEvent('User lookup denied', 'low', { callerId: caller.userId, targetUserId: id });
      throw new AppError(ErrorMessages.FORBIDDEN, 403, 'FORBIDDEN');
    }

    const user = await this.users.findById(id);
    if (!user) {
      throw new AppError(ErrorMessages.USER_NOT_FOUND, 404, 'NOT_FOUND');
    }
    return user;
  }
}
