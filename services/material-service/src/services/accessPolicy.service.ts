/**
 * Access Policy
 * Who may moderate, and who may see materials that are not approved yet
 */

import { AppError } from '@campus-portal/shared/config/errorHandler';
import { logSecurityEvent } from '@campus-portal/shared/config/logger';
import { ErrorMessages } from '@campus-portal/shared/utils/errorMessages';
import type { AuthenticatedCaller, Caller } from '@campus-portal/shared/types/caller';
import type { UserRoleDirectory } from '../models/coordinator.model';
import type { StudyMaterial, VerificationStatus } from '../models/studyMaterial.model';

export class AccessPolicy {
  constructor(private readonly roles: UserRoleDirectory) {}

  /**
   * Staff, superusers, and anyone holding at least one coordinator role
   */
  async isVerifier(caller: Caller): Promise<boolean> {
    if (!caller.authenticated) {
      return false;
    }
    if (caller.isStaff || caller.isSuperuser) {
      return true;
    }
    return this.roles.hasCoordinatorRole(caller.userId);
  }

  /**
   * Coordinators are deliberately not included here (see DESIGN.md)
   */
  canViewUnapproved(caller: Caller): boolean {
    return caller.authenticated && (caller.isStaff || caller.isSuperuser);
  }

  /** Status filter for listings; undefined means no restriction */
  visibleStatus(caller: Caller): VerificationStatus | undefined {
    return this.canViewUnapproved(caller) ? undefined : 'approved';
  }

  canView(caller: Caller, material: Pick<StudyMaterial, 'verificationStatus'>): boolean {
    return material.verificationStatus === 'approved' || this.canViewUnapproved(caller);
  }

  /**
   * Throws 401 for anonymous callers and 403 for authenticated non-verifiers
   */
  async requireVerifier(caller: Caller): Promise<AuthenticatedCaller> {
    if (!caller.authenticated) {
      throw new AppError(ErrorMessages.AUTH_REQUIRED, 401, 'UNAUTHENTICATED');
    }
    if (!(await this.isVerifier(caller))) {
      logSecurityEvent('Moderation access denied', 'medium', {
        userId: caller.userId,
        role: caller.role,
      });
      throw new AppError(ErrorMessages.FORBIDDEN, 403, 'FORBIDDEN');
    }
    return caller;
  }
}
