/**
 * Favorite Model - PostgreSQL
 * One row per (user, material); study_materials.favorites_count mirrors the row count
 */

import type { Pool } from 'pg';
import { withTransaction } from '@campus-portal/shared/databases/postgres/connection';
import {
  counterUpdateSql,
  rowToStudyMaterial,
  type StudyMaterial,
  type StudyMaterialRow,
  type VerificationStatus,
} from './studyMaterial.model';

export interface FavoriteToggleResult {
  favorited: boolean;
  favoritesCount: number;
}

export interface FavoriteEntry {
  material: StudyMaterial;
  favoritedAt: Date;
}

export interface UserMaterialListQuery {
  limit: number;
  /** Omitted means every status */
  status?: VerificationStatus;
}

export interface FavoriteStore {
  toggle(userId: string, materialId: string): Promise<FavoriteToggleResult>;
  exists(userId: string, materialId: string): Promise<boolean>;
  /** Newest favorite first */
  listForUser(userId: string, query: UserMaterialListQuery): Promise<FavoriteEntry[]>;
}

interface FavoriteMaterialRow extends StudyMaterialRow {
  favorited_at: Date;
}

const DELETE_FAVORITE = 'DELETE FROM user_favorite_materials WHERE user_id = $1 AND material_id = $2';

export class FavoriteRepository implements FavoriteStore {
  constructor(private pool: Pool) {}

  /**
   * Removes the favorite when present, adds it otherwise.
   * An insert that loses the race to a concurrent toggle (ON CONFLICT) is treated as
   * already favorited and falls through to the delete branch.
   */
  async toggle(userId: string, materialId: string): Promise<FavoriteToggleResult> {
    return withTransaction(this.pool, async (client) => {
      let delta = 0;

      const removed = await client.query(DELETE_FAVORITE, [userId, materialId]);
      if ((removed.rowCount ?? 0) > 0) {
        delta = -1;
      } else {
        const inserted = await client.query(
          `
            INSERT INTO user_favorite_materials (user_id, material_id)
            VALUES ($1, $2)
            ON CONFLICT (user_id, material_id) DO NOTHING
            RETURNING id
          `,
          [userId, materialId]
        );
        if ((inserted.rowCount ?? 0) > 0) {
          delta = 1;
        } else {
          const retried = await client.query(DELETE_FAVORITE, [userId, materialId]);
          delta = (retried.rowCount ?? 0) > 0 ? -1 : 0;
        }
      }

      if (delta === 0) {
        const current = await client.query<{ value: number }>(
          'SELECT favorites_count AS value FROM study_materials WHERE id = $1',
          [materialId]
        );
        const stillFavorited = await client.query(
          'SELECT 1 FROM user_favorite_materials WHERE user_id = $1 AND material_id = $2',
          [userId, materialId]
        );
        return {
          favorited: stillFavorited.rows.length > 0,
          favoritesCount: current.rows[0]?.value ?? 0,
        };
      }

      const counter = await client.query<{ value: number }>(counterUpdateSql('favorites'), [materialId, delta]);
      return {
        favorited: delta > 0,
        favoritesCount: counter.rows[0]?.value ?? 0,
      };
    });
  }

  async exists(userId: string, materialId: string): Promise<boolean> {
    const result = await this.pool.query(
      'SELECT 1 FROM user_favorite_materials WHERE user_id = $1 AND material_id = $2',
      [userId, materialId]
    );
    return result.rows.length > 0;
  }

  async listForUser(userId: string, query: UserMaterialListQuery): Promise<FavoriteEntry[]> {
    const values: unknown[] = [userId];
    let statusClause = '';
    if (query.status) {
      values.push(query.status);
      statusClause = `AND m.verification_status = $${values.length}`;
    }
    values.push(query.limit);

    const result = await this.pool.query<FavoriteMaterialRow>(
      `
        SELECT m.*, d.name AS department_name, d.short_code AS department_short_code,
               f.created_at AS favorited_at
        FROM user_favorite_materials f
        JOIN study_materials m ON m.id = f.material_id
        JOIN departments d ON d.id = m.department_id
        WHERE f.user_id = $1 ${statusClause}
        ORDER BY f.created_at DESC
        LIMIT $${values.length}
      `,
      values
    );

    return result.rows.map((row) => ({
      material: rowToStudyMaterial(row),
      favoritedAt: row.favorited_at,
    }));
  }
}
