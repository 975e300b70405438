/**
 * Search Query Log Model - PostgreSQL
 * Append-only record of filtered material listings
 */

import type { Pool } from 'pg';

export const MAX_QUERY_LENGTH = 255;

interface SearchTermStatRow {
  query: string;
  count: number;
  last_searched_at: Date;
}

export interface SearchTermStat {
  query: string;
  count: number;
  lastSearchedAt: Date;
}

export interface SearchLogStore {
  append(query: string, userId: string | null): Promise<void>;
  /** Grouped by exact query; highest count first, then most recent */
  topQueries(limit: number): Promise<SearchTermStat[]>;
}

export class SearchQueryLogRepository implements SearchLogStore {
  constructor(private pool: Pool) {}

  async append(query: string, userId: string | null): Promise<void> {
    await this.pool.query('INSERT INTO search_query_logs (query, user_id) VALUES ($1, $2)', [
      query.slice(0, MAX_QUERY_LENGTH),
      userId,
    ]);
  }

  async topQueries(limit: number): Promise<SearchTermStat[]> {
    const result = await this.pool.query<SearchTermStatRow>(
      `
        SELECT query, COUNT(*)::int AS count, MAX(created_at) AS last_searched_at
        FROM search_query_logs
        GROUP BY query
        ORDER BY count DESC, last_searched_at DESC
        LIMIT $1
      `,
      [limit]
    );
    return result.rows.map((row) => ({
      query: row.query,
      count: row.count,
      lastSearchedAt: row.last_searched_at,
    }));
  }
}
