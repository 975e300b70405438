/**
 * Study Material Model - PostgreSQL
 * Uploaded materials with their moderation state and engagement counters
 */

import type { Pool } from 'pg';
import { withTransaction } from '@campus-portal/shared/databases/postgres/connection';
import { logDatabaseOperation } from '@campus-portal/shared/config/logger';
import type { DepartmentSummary } from './department.model';
import { insertUploadAudit } from './uploadAudit.model';

export type FileType = 'pdf' | 'video' | 'link';
export type VerificationStatus = 'pending' | 'approved' | 'rejected';
export type MaterialCounter = 'downloads' | 'views' | 'favorites';

export const FILE_TYPES: readonly FileType[] = ['pdf', 'video', 'link'];
export const VERIFICATION_STATUSES: readonly VerificationStatus[] = ['pending', 'approved', 'rejected'];

export interface StudyMaterialRow {
  id: string;
  department_id: string;
  department_name: string;
  department_short_code: string;
  uploader_id: string;
  title: string;
  description: string | null;
  file_drive_id: string | null;
  file_type: FileType;
  subject_tags: unknown;
  semester: number;
  year: number;
  verification_status: VerificationStatus;
  verifier_id: string | null;
  uploaded_at: Date;
  verified_at: Date | null;
  downloads_count: number;
  views_count: number;
  thumbs_up_count: number;
  favorites_count: number;
}

export interface StudyMaterial {
  id: string;
  department: DepartmentSummary;
  uploaderId: string;
  title: string;
  description: string | null;
  fileDriveId: string | null;
  fileType: FileType;
  subjectTags: string[];
  semester: number;
  year: number;
  verificationStatus: VerificationStatus;
  verifierId: string | null;
  uploadedAt: Date;
  verifiedAt: Date | null;
  downloadsCount: number;
  viewsCount: number;
  thumbsUpCount: number;
  favoritesCount: number;
}

export interface StudyMaterialCreateInput {
  departmentId: string;
  uploaderId: string;
  title: string;
  description?: string;
  fileDriveId?: string;
  fileType: FileType;
  subjectTags: string[];
  semester: number;
  year: number;
}

export interface StudyMaterialListQuery {
  departmentId?: string;
  semester?: number;
  year?: number;
  /** Omitted means every status */
  status?: VerificationStatus;
  limit: number;
}

/**
 * Persisted outcome of a moderation action.
 * stampVerifiedAt=false leaves verified_at exactly as stored.
 */
export interface ModerationDecision {
  status: VerificationStatus;
  verifierId: string;
  stampVerifiedAt: boolean;
}

export interface DecisionAudit {
  reason: string;
  decidedAt: Date;
}

export interface StudyMaterialStore {
  /** Inserts the material and its "upload" audit row in one transaction */
  create(input: StudyMaterialCreateInput): Promise<StudyMaterial>;
  findById(id: string): Promise<StudyMaterial | null>;
  /** Newest upload first */
  list(query: StudyMaterialListQuery): Promise<StudyMaterial[]>;
  /** Single-statement atomic add; resolves the new value, or null when the material is gone */
  incrementCounter(id: string, counter: MaterialCounter, delta: number): Promise<number | null>;
  /** Writes the status change and its "edit" audit row in one transaction */
  applyDecision(id: string, decision: ModerationDecision, audit: DecisionAudit): Promise<StudyMaterial | null>;
  topByEngagement(options: { limit: number; status?: VerificationStatus }): Promise<StudyMaterial[]>;
}

const COUNTER_COLUMNS: Record<MaterialCounter, string> = {
  downloads: 'downloads_count',
  views: 'views_count',
  favorites: 'favorites_count',
};

/**
 * `col = col + $2` keeps concurrent increments from losing updates.
 * Parameters: $1 material id, $2 delta. Returns the new value as `value`.
 */
export function counterUpdateSql(counter: MaterialCounter): string {
  const column = COUNTER_COLUMNS[counter];
  return `UPDATE study_materials SET ${column} = ${column} + $2 WHERE id = $1 RETURNING ${column} AS value`;
}

const MATERIAL_COLUMNS = `
  m.*,
  d.name AS department_name,
  d.short_code AS department_short_code
`;

const SELECT_MATERIAL = `
  SELECT ${MATERIAL_COLUMNS}
  FROM study_materials m
  JOIN departments d ON d.id = m.department_id
`;

function normalizeTags(value: unknown): string[] {
  if (!Array.isArray(value)) {
    return [];
  }
  return value.filter((tag): tag is string => typeof tag === 'string');
}

export function rowToStudyMaterial(row: StudyMaterialRow): StudyMaterial {
  return {
    id: row.id,
    department: {
      id: row.department_id,
      name: row.department_name,
      shortCode: row.department_short_code,
    },
    uploaderId: row.uploader_id,
    title: row.title,
    description: row.description,
    fileDriveId: row.file_drive_id,
    fileType: row.file_type,
    subjectTags: normalizeTags(row.subject_tags),
    semester: row.semester,
    year: row.year,
    verificationStatus: row.verification_status,
    verifierId: row.verifier_id,
    uploadedAt: row.uploaded_at,
    verifiedAt: row.verified_at,
    downloadsCount: row.downloads_count,
    viewsCount: row.views_count,
    thumbsUpCount: row.thumbs_up_count,
    favoritesCount: row.favorites_count,
  };
}

export class StudyMaterialRepository implements StudyMaterialStore {
  constructor(private pool: Pool) {}

  async create(input: StudyMaterialCreateInput): Promise<StudyMaterial> {
    const material = await withTransaction(this.pool, async (client) => {
      const inserted = await client.query<StudyMaterialRow>(
        `
          WITH inserted AS (
            INSERT INTO study_materials (
              department_id, uploader_id, title, description, file_drive_id,
              file_type, subject_tags, semester, year, verification_status
            ) VALUES ($1, $2, $3, $4, $5, $6, $7::jsonb, $8, $9, 'pending')
            RETURNING *
          )
          SELECT inserted.*, d.name AS department_name, d.short_code AS department_short_code
          FROM inserted
          JOIN departments d ON d.id = inserted.department_id
        `,
        [
          input.departmentId,
          input.uploaderId,
          input.title,
          input.description || null,
          input.fileDriveId || null,
          input.fileType,
          JSON.stringify(input.subjectTags),
          input.semester,
          input.year,
        ]
      );
      const created = rowToStudyMaterial(inserted.rows[0]);

      await insertUploadAudit(client, {
        materialId: created.id,
        userId: input.uploaderId,
        action: 'upload',
        reason: 'Initial upload',
      });

      return created;
    });

    logDatabaseOperation('insert', 'study_materials', { materialId: material.id });
    return material;
  }

  async findById(id: string): Promise<StudyMaterial | null> {
    const result = await this.pool.query<StudyMaterialRow>(`${SELECT_MATERIAL} WHERE m.id = $1`, [id]);
    return result.rows.length > 0 ? rowToStudyMaterial(result.rows[0]) : null;
  }

  async list(query: StudyMaterialListQuery): Promise<StudyMaterial[]> {
    const conditions: string[] = [];
    const values: unknown[] = [];

    if (query.status) {
      values.push(query.status);
      conditions.push(`m.verification_status = $${values.length}`);
    }
    if (query.departmentId) {
      values.push(query.departmentId);
      conditions.push(`m.department_id = $${values.length}`);
    }
    if (query.semester !== undefined) {
      values.push(query.semester);
      conditions.push(`m.semester = $${values.length}`);
    }
    if (query.year !== undefined) {
      values.push(query.year);
      conditions.push(`m.year = $${values.length}`);
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    values.push(query.limit);

    const result = await this.pool.query<StudyMaterialRow>(
      `${SELECT_MATERIAL} ${where} ORDER BY m.uploaded_at DESC LIMIT $${values.length}`,
      values
    );
    return result.rows.map(rowToStudyMaterial);
  }

  async incrementCounter(id: string, counter: MaterialCounter, delta: number): Promise<number | null> {
    const result = await this.pool.query<{ value: number }>(counterUpdateSql(counter), [id, delta]);
    return result.rows.length > 0 ? result.rows[0].value : null;
  }

  async applyDecision(id: string, decision: ModerationDecision, audit: DecisionAudit): Promise<StudyMaterial | null> {
    return withTransaction(this.pool, async (client) => {
      const updated = await client.query<StudyMaterialRow>(
        `
          WITH updated AS (
            UPDATE study_materials
            SET verification_status = $2,
                verifier_id = $3,
                verified_at = CASE WHEN $4::boolean THEN $5::timestamptz ELSE verified_at END
            WHERE id = $1
            RETURNING *
          )
          SELECT updated.*, d.name AS department_name, d.short_code AS department_short_code
          FROM updated
          JOIN departments d ON d.id = updated.department_id
        `,
        [id, decision.status, decision.verifierId, decision.stampVerifiedAt, audit.decidedAt]
      );

      if (updated.rows.length === 0) {
        return null;
      }

      await insertUploadAudit(client, {
        materialId: id,
        userId: decision.verifierId,
        action: 'edit',
        reason: audit.reason,
        createdAt: audit.decidedAt,
      });

      return rowToStudyMaterial(updated.rows[0]);
    });
  }

  async topByEngagement(options: { limit: number; status?: VerificationStatus }): Promise<StudyMaterial[]> {
    const values: unknown[] = [];
    let where = '';
    if (options.status) {
      values.push(options.status);
      where = `WHERE m.verification_status = $${values.length}`;
    }
    values.push(options.limit);

    const result = await this.pool.query<StudyMaterialRow>(
      `
        ${SELECT_MATERIAL}
        ${where}
        ORDER BY (m.downloads_count + m.views_count + m.favorites_count * 2) DESC,
                 m.downloads_count DESC,
                 m.views_count DESC,
                 m.favorites_count DESC
        LIMIT $${values.length}
      `,
      values
    );
    return result.rows.map(rowToStudyMaterial);
  }
}
