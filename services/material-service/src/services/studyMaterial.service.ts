/**
 * Study Material Service - Business Logic
 * Upload, browse, detail and download flows with visibility rules applied
 */

import { AppError, isForeignKeyViolation } from '@campus-portal/shared/config/errorHandler';
import logger from '@campus-portal/shared/config/logger';
import { ErrorMessages } from '@campus-portal/shared/utils/errorMessages';
import type { AuthenticatedCaller, Caller } from '@campus-portal/shared/types/caller';
import type { DepartmentLookup } from '../models/department.model';
import type { FavoriteStore, FavoriteToggleResult } from '../models/favorite.model';
import type { FileType, StudyMaterial, StudyMaterialStore } from '../models/studyMaterial.model';
import type { AccessPolicy } from './accessPolicy.service';
import type { EngagementService } from './engagement.service';
import type { AppliedMaterialFilters, MaterialFilterInput, SearchLogService } from './searchLog.service';

export const RECENT_MATERIALS_LIMIT = 5;

export interface UploadMaterialInput {
  title: string;
  description?: string;
  department: string;
  fileType: FileType;
  fileDriveId?: string;
  subjectTags: string[];
  semester: number;
  year: number;
}

export interface MaterialDetail {
  material: StudyMaterial;
  isFavorite: boolean;
}

export class StudyMaterialService {
  constructor(
    private readonly materials: StudyMaterialStore,
    private readonly departments: DepartmentLookup,
    private readonly favorites: FavoriteStore,
    private readonly engagement: EngagementService,
    private readonly searchLog: SearchLogService,
    private readonly policy: AccessPolicy
  ) {}

  /**
   * New uploads always start pending, whatever the uploader's role
   */
  async uploadMaterial(caller: AuthenticatedCaller, input: UploadMaterialInput): Promise<StudyMaterial> {
    const department = await this.departments.resolve(input.department);
    if (!department) {
      throw new AppError(ErrorMessages.DEPARTMENT_NOT_FOUND, 404, 'NOT_FOUND');
    }

    try {
      const material = await this.materials.create({
        departmentId: department.id,
        uploaderId: caller.userId,
        title: input.title,
        description: input.description,
        fileDriveId: input.fileDriveId,
        fileType: input.fileType,
        subjectTags: input.subjectTags,
        semester: input.semester,
        year: input.year,
      });

      logger.info('Study material uploaded', {
        service: 'material-service',
        materialId: material.id,
        uploaderId: caller.userId,
        departmentId: department.id,
      });
      return material;
    } catch (error) {
      if (isForeignKeyViolation(error)) {
        throw new AppError(ErrorMessages.USER_NOT_FOUND, 404, 'NOT_FOUND');
      }
      throw error;
    }
  }

  /**
   * Newest first. Filters that cannot be applied (unknown department) are skipped,
   * and the applied ones are written to the search log.
   */
  async listMaterials(caller: Caller, filters: MaterialFilterInput, limit: number): Promise<StudyMaterial[]> {
    const applied = await this.resolveFilters(filters);

    const materials = await this.materials.list({
      status: this.policy.visibleStatus(caller),
      departmentId: applied.department?.id,
      semester: applied.semester,
      year: applied.year,
      limit,
    });

    await this.searchLog.logSearch(applied, caller.authenticated ? caller.userId : null);
    return materials;
  }

  async recentMaterials(caller: Caller): Promise<StudyMaterial[]> {
    return this.materials.list({
      status: this.policy.visibleStatus(caller),
      limit: RECENT_MATERIALS_LIMIT,
    });
  }

  /**
   * Counts a view, remembers it for the caller's library, and reports favorite state
   */
  async materialDetail(caller: Caller, materialId: string): Promise<MaterialDetail> {
    const material = await this.findVisible(caller, materialId);
    const viewsCount = await this.engagement.recordView(material.id);

    let isFavorite = false;
    if (caller.authenticated) {
      isFavorite = await this.favorites.exists(caller.userId, material.id);
      await this.engagement.touchRecentlyViewed(caller.userId, material.id);
    }

    return {
      material: { ...material, viewsCount },
      isFavorite,
    };
  }

  async downloadMaterial(caller: Caller, materialId: string): Promise<string> {
    const material = await this.findVisible(caller, materialId);
    return this.engagement.recordDownload(material);
  }

  async toggleFavorite(caller: AuthenticatedCaller, materialId: string): Promise<FavoriteToggleResult> {
    const material = await this.findVisible(caller, materialId);
    return this.engagement.toggleFavorite(caller.userId, material.id);
  }

  private async resolveFilters(filters: MaterialFilterInput): Promise<AppliedMaterialFilters> {
    const applied: AppliedMaterialFilters = {
      semester: filters.semester,
      year: filters.year,
    };
    if (filters.department) {
      const department = await this.departments.resolve(filters.department);
      if (department) {
        applied.department = department;
      }
    }
    return applied;
  }

  /**
   * Materials the caller may not see answer 404, same as missing ones
   */
  private async findVisible(caller: Caller, materialId: string): Promise<StudyMaterial> {
    const material = await this.materials.findById(materialId);
    if (!material || !this.policy.canView(caller, material)) {
      throw new AppError(ErrorMessages.MATERIAL_NOT_FOUND, 404, 'NOT_FOUND');
    }
    return material;
  }
}
