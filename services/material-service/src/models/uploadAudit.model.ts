/**
 * Upload Audit Model - PostgreSQL
 * Append-only trail of uploads and moderation decisions
 */

import type { Pool, PoolClient } from 'pg';

export type AuditAction = 'upload' | 'edit' | 'delete';

interface UploadAuditRow {
  id: string;
  material_id: string;
  user_id: string;
  action: AuditAction;
  reason: string | null;
  created_at: Date;
}

export interface UploadAudit {
  id: string;
  materialId: string;
  userId: string;
  action: AuditAction;
  reason: string | null;
  createdAt: Date;
}

export interface UploadAuditCreateInput {
  materialId: string;
  userId: string;
  action: AuditAction;
  reason: string;
  createdAt?: Date;
}

export interface UploadAuditStore {
  /** Newest entry first */
  listForMaterial(materialId: string): Promise<UploadAudit[]>;
}

function rowToAudit(row: UploadAuditRow): UploadAudit {
  return {
    id: row.id,
    materialId: row.material_id,
    userId: row.user_id,
    action: row.action,
    reason: row.reason,
    createdAt: row.created_at,
  };
}

/**
 * Runs on the caller's transaction client so the audit row commits with the change it records
 */
export async function insertUploadAudit(client: PoolClient, input: UploadAuditCreateInput): Promise<UploadAudit> {
  const result = await client.query<UploadAuditRow>(
    `
      INSERT INTO upload_audits (material_id, user_id, action, reason, created_at)
      VALUES ($1, $2, $3, $4, COALESCE($5::timestamptz, NOW()))
      RETURNING *
    `,
    [input.materialId, input.userId, input.action, input.reason, input.createdAt ?? null]
  );
  return rowToAudit(result.rows[0]);
}

export class UploadAuditRepository implements UploadAuditStore {
  constructor(private pool: Pool) {}

  async listForMaterial(materialId: string): Promise<UploadAudit[]> {
    const result = await this.pool.query<UploadAuditRow>(
      'SELECT * FROM upload_audits WHERE material_id = $1 ORDER BY created_at DESC',
      [materialId]
    );
    return result.rows.map(rowToAudit);
  }
}
