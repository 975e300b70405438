export interface EngagementCounts {
  downloadsCount: number;
  viewsCount: number;
  favoritesCount: number;
}

export type Ranked<T> = T & { rank: number; engagementScore: number };

// Favorites weigh double
export function engagementScore(material: EngagementCounts): number {
  return material.downloadsCount + material.viewsCount + material.favoritesCount * 2;
}

/**
 * Descending by score, then downloads, views, favorites.
 * Mirrors the ORDER BY of StudyMaterialRepository.topByEngagement.
 */
export function compareByEngagement(a: EngagementCounts, b: EngagementCounts): number {
  return (
    engagementScore(b) - engagementScore(a) ||
    b.downloadsCount - a.downloadsCount ||
    b.viewsCount - a.viewsCount ||
    b.favoritesCount - a.favoritesCount
  );
}

/**
 * Attaches 1-based ranks in the given order
 */
export function rankByEngagement<T extends EngagementCounts>(materials: T[]): Ranked<T>[] {
  return materials.map((material, index) => ({
    ...material,
    rank: index + 1,
    engagementScore: engagementScore(material),
  }));
}
