import type { Pool } from 'pg';
import { rowToStudyMaterial, type StudyMaterial, type StudyMaterialRow } from './studyMaterial.model';
import type { UserMaterialListQuery } from './favorite.model';

export interface RecentViewEntry {
  material: StudyMaterial;
  lastViewedAt: Date;
}

export interface RecentViewStore {
  /** Upsert on (user, material) setting last_viewed_at to now */
  touch(userId: string, materialId: string): Promise<void>;
  /** Most recently viewed first */
  listForUser(userId: string, query: UserMaterialListQuery): Promise<RecentViewEntry[]>;
}

interface RecentViewMaterialRow extends StudyMaterialRow {
  last_viewed_at: Date;
}

export class RecentViewRepository implements RecentViewStore {
  constructor(private pool: Pool) {}

  async touch(userId: string, materialId: string): Promise<void> {
    await this.pool.query(
      `
        INSERT INTO recently_viewed_materials (user_id, material_id, last_viewed_at)
        VALUES ($1, $2, NOW())
        ON CONFLICT (user_id, material_id) DO UPDATE SET last_viewed_at = EXCLUDED.last_viewed_at
      `,
      [userId, materialId]
    );
  }

  async listForUser(userId: string, query: UserMaterialListQuery): Promise<RecentViewEntry[]> {
    const values: unknown[] = [userId];
    let statusClause = '';
    if (query.status) {
      values.push(query.status);
      statusClause = `AND m.verification_status = $${values.length}`;
    }
    values.push(query.limit);

    const result = await this.pool.query<RecentViewMaterialRow>(
      `
        SELECT m.*, d.name AS department_name, d.short_code AS department_short_code,
               r.last_viewed_at
        FROM recently_viewed_materials r
        JOIN study_materials m ON m.id = r.material_id
        JOIN departments d ON d.id = m.department_id
        WHERE r.user_id = $1 ${statusClause}
        ORDER BY r.last_viewed_at DESC
        LIMIT $${values.length}
      `,
      values
    );

    return result.rows.map((row) => ({
      material: rowToStudyMaterial(row),
      lastViewedAt: row.last_viewed_at,
    }));
  }
}
