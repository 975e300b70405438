/**
 * Search Logger
 * Records which filters students combine when browsing materials
 */

import type { DepartmentSummary } from '../models/department.model';
import type { SearchLogStore, SearchTermStat } from '../models/searchQueryLog.model';

export const TOP_SEARCH_TERMS_LIMIT = 50;

/** Filters exactly as they arrived, after blank and non-integer values were dropped */
export interface MaterialFilterInput {
  department?: string;
  semester?: number;
  year?: number;
}

/** Filters that actually narrowed the listing */
export interface AppliedMaterialFilters {
  department?: DepartmentSummary;
  semester?: number;
  year?: number;
}

/**
 * "department:CSE semester:3 year:2024" in that fixed order, or null when nothing applied
 */
export function describeSearch(filters: AppliedMaterialFilters): string | null {
  const parts: string[] = [];
  if (filters.department) {
    parts.push(`department:${filters.department.shortCode}`);
  }
  if (filters.semester !== undefined) {
    parts.push(`semester:${filters.semester}`);
  }
  if (filters.year !== undefined) {
    parts.push(`year:${filters.year}`);
  }
  return parts.length > 0 ? parts.join(' ') : null;
}

export class SearchLogService {
  constructor(private readonly logs: SearchLogStore) {}

  async logSearch(filters: AppliedMaterialFilters, userId: string | null): Promise<void> {
    const query = describeSearch(filters);
    if (query === null) {
      return;
    }
    await this.logs.append(query, userId);
  }

  async topSearchTerms(limit = TOP_SEARCH_TERMS_LIMIT): Promise<SearchTermStat[]> {
    return this.logs.topQueries(limit);
  }
}
