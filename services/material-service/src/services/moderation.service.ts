/**
 * Moderation Workflow
 *
 * pending --approve--> approved, pending --reject--> rejected,
 * approved <--> rejected on the opposite action.
 * request_changes keeps the status and only records who looked at it.
 */

import { AppError } from '@campus-portal/shared/config/errorHandler';
import logger from '@campus-portal/shared/config/logger';
import { ErrorMessages } from '@campus-portal/shared/utils/errorMessages';
import type { AuthenticatedCaller, Caller } from '@campus-portal/shared/types/caller';
import type { DepartmentLookup } from '../models/department.model';
import type { UploadAudit, UploadAuditStore } from '../models/uploadAudit.model';
import type {
  ModerationDecision,
  StudyMaterial,
  StudyMaterialStore,
  VerificationStatus,
} from '../models/studyMaterial.model';
import type { AccessPolicy } from './accessPolicy.service';

export const MODERATION_ACTIONS = ['approve', 'reject', 'request_changes'] as const;
export type ModerationAction = (typeof MODERATION_ACTIONS)[number];

export type ModerationQueueStatus = VerificationStatus | 'all';

export const MODERATION_QUEUE_LIMIT = 200;

export interface ModerationQueueQuery {
  status: ModerationQueueStatus;
  department?: string;
}

export interface ModerationDetail {
  material: StudyMaterial;
  auditTrail: UploadAudit[];
  canApprove: boolean;
}

/**
 * Pure transition function. Re-approving an approved material (or re-rejecting a
 * rejected one) is accepted and refreshes the verifier and timestamp.
 */
export function decideModeration(
  material: Pick<StudyMaterial, 'verificationStatus'>,
  action: ModerationAction,
  actorId: string
): ModerationDecision {
  switch (action) {
    case 'approve':
      return { status: 'approved', verifierId: actorId, stampVerifiedAt: true };
    case 'reject':
      return { status: 'rejected', verifierId: actorId, stampVerifiedAt: true };
    case 'request_changes':
      return { status: material.verificationStatus, verifierId: actorId, stampVerifiedAt: false };
  }
}

export function moderationAuditReason(action: ModerationAction, reason?: string): string {
  const trimmed = reason?.trim();
  return trimmed ? trimmed : `Moderation action: ${action}`;
}

export class ModerationService {
  constructor(
    private readonly materials: StudyMaterialStore,
    private readonly audits: UploadAuditStore,
    private readonly departments: DepartmentLookup,
    private readonly policy: AccessPolicy,
    private readonly clock: () => Date = () => new Date()
  ) {}

  /** 401 for anonymous callers, 403 for callers who are not verifiers */
  authorize(caller: Caller): Promise<AuthenticatedCaller> {
    return this.policy.requireVerifier(caller);
  }

  async applyModerationAction(
    caller: Caller,
    materialId: string,
    action: ModerationAction,
    reason?: string
  ): Promise<StudyMaterial> {
    const verifier = await this.policy.requireVerifier(caller);

    const material = await this.materials.findById(materialId);
    if (!material) {
      throw new AppError(ErrorMessages.MATERIAL_NOT_FOUND, 404, 'NOT_FOUND');
    }

    const decision = decideModeration(material, action, verifier.userId);
    const updated = await this.materials.applyDecision(materialId, decision, {
      reason: moderationAuditReason(action, reason),
      decidedAt: this.clock(),
    });
    if (!updated) {
      throw new AppError(ErrorMessages.MATERIAL_NOT_FOUND, 404, 'NOT_FOUND');
    }

    logger.info('Moderation decision recorded', {
      service: 'material-service',
      materialId,
      action,
      from: material.verificationStatus,
      to: updated.verificationStatus,
      verifierId: verifier.userId,
    });

    return updated;
  }

  /**
   * Newest upload first. An unknown department filter is ignored.
   */
  async moderationQueue(caller: Caller, query: ModerationQueueQuery): Promise<StudyMaterial[]> {
    await this.policy.requireVerifier(caller);

    const department = query.department ? await this.departments.resolve(query.department) : null;

    return this.materials.list({
      status: query.status === 'all' ? undefined : query.status,
      departmentId: department?.id,
      limit: MODERATION_QUEUE_LIMIT,
    });
  }

  async moderationDetail(caller: Caller, materialId: string): Promise<ModerationDetail> {
    await this.policy.requireVerifier(caller);

    const material = await this.materials.findById(materialId);
    if (!material) {
      throw new AppError(ErrorMessages.MATERIAL_NOT_FOUND, 404, 'NOT_FOUND');
    }

    const auditTrail = await this.audits.listForMaterial(materialId);
    return {
      material,
      auditTrail,
      canApprove: true,
    };
  }
}
