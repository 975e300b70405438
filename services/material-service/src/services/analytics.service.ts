import type { Caller } from '@campus-portal/shared/types/caller';
import type { SearchTermStat } from '../models/searchQueryLog.model';
import type { StudyMaterial } from '../models/studyMaterial.model';
import type { Ranked } from '../utils/engagement';
import type { AccessPolicy } from './accessPolicy.service';
import type { EngagementService } from './engagement.service';
import type { SearchLogService } from './searchLog.service';

/**
 * Read-side reports over engagement counters and the search log.
 * Search terms are staff-only; the route enforces that.
 */
export class AnalyticsService {
  constructor(
    private readonly engagement: EngagementService,
    private readonly searchLog: SearchLogService,
    private readonly policy: AccessPolicy
  ) {}

  async topMaterials(caller: Caller): Promise<Ranked<StudyMaterial>[]> {
    return this.engagement.topMaterials(this.policy.visibleStatus(caller));
  }

  async searchTerms(): Promise<SearchTermStat[]> {
    return this.searchLog.topSearchTerms();
  }
}
