/**
 * Engagement Counters
 * Views, downloads and favorites, plus the engagement leaderboard
 */

import { AppError } from '@campus-portal/shared/config/errorHandler';
import logger from '@campus-portal/shared/config/logger';
import { ErrorMessages } from '@campus-portal/shared/utils/errorMessages';
import type { FavoriteStore, FavoriteToggleResult } from '../models/favorite.model';
import type { RecentViewStore } from '../models/recentView.model';
import type { StudyMaterial, StudyMaterialStore, VerificationStatus } from '../models/studyMaterial.model';
import { resolveDownloadTarget } from '../utils/downloadTarget';
import { rankByEngagement, type Ranked } from '../utils/engagement';

export const TOP_MATERIALS_LIMIT = 20;

export class EngagementService {
  constructor(
    private readonly materials: StudyMaterialStore,
    private readonly favorites: FavoriteStore,
    private readonly recentViews: RecentViewStore
  ) {}

  /**
   * Every call counts; there is no per-user deduplication
   */
  async recordView(materialId: string): Promise<number> {
    const views = await this.materials.incrementCounter(materialId, 'views', 1);
    if (views === null) {
      throw new AppError(ErrorMessages.MATERIAL_NOT_FOUND, 404, 'NOT_FOUND');
    }
    return views;
  }

  /**
   * Counts the download and returns the redirect target
   */
  async recordDownload(material: Pick<StudyMaterial, 'id' | 'fileDriveId'>): Promise<string> {
    const downloads = await this.materials.incrementCounter(material.id, 'downloads', 1);
    if (downloads === null) {
      throw new AppError(ErrorMessages.MATERIAL_NOT_FOUND, 404, 'NOT_FOUND');
    }
    return resolveDownloadTarget(material);
  }

  async toggleFavorite(userId: string, materialId: string): Promise<FavoriteToggleResult> {
    const result = await this.favorites.toggle(userId, materialId);
    logger.info(result.favorited ? 'Material favorited' : 'Material unfavorited', {
      service: 'material-service',
      userId,
      materialId,
      favoritesCount: result.favoritesCount,
    });
    return result;
  }

  async touchRecentlyViewed(userId: string, materialId: string): Promise<void> {
    await this.recentViews.touch(userId, materialId);
  }

  async topMaterials(status: VerificationStatus | undefined, limit = TOP_MATERIALS_LIMIT): Promise<Ranked<StudyMaterial>[]> {
    const materials = await this.materials.topByEngagement({ limit, status });
    return rankByEngagement(materials);
  }
}
