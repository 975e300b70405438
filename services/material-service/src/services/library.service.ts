import type { AuthenticatedCaller } from '@campus-portal/shared/types/caller';
import type { FavoriteEntry, FavoriteStore } from '../models/favorite.model';
import type { RecentViewEntry, RecentViewStore } from '../models/recentView.model';
import type { AccessPolicy } from './accessPolicy.service';

export const LIBRARY_SECTION_LIMIT = 20;

export interface PersonalLibrary {
  favorites: FavoriteEntry[];
  recentlyViewed: RecentViewEntry[];
}

/**
 * A caller's favorites and recently viewed materials.
 * Verifiers keep seeing entries whose material is no longer approved.
 */
export class LibraryService {
  constructor(
    private readonly favorites: FavoriteStore,
    private readonly recentViews: RecentViewStore,
    private readonly policy: AccessPolicy
  ) {}

  async library(caller: AuthenticatedCaller): Promise<PersonalLibrary> {
    const status = (await this.policy.isVerifier(caller)) ? undefined : 'approved';
    const query = { limit: LIBRARY_SECTION_LIMIT, status } as const;

    const [favorites, recentlyViewed] = await Promise.all([
      this.favorites.listForUser(caller.userId, query),
      this.recentViews.listForUser(caller.userId, query),
    ]);

    return { favorites, recentlyViewed };
  }
}
