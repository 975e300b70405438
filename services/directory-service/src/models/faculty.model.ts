/**
 * Faculty Model - PostgreSQL
 */

import type { Pool } from 'pg';
import { logDatabaseOperation } from '@campus-portal/shared/config/logger';

export type FacultyStatus = 'active' | 'retired';

export const FACULTY_STATUSES: readonly FacultyStatus[] = ['active', 'retired'];

interface FacultyRow {
  id: string;
  department_id: string;
  name: string;
  title: string | null;
  photo_url: string | null;
  biography: string | null;
  research_interests: string | null;
  contact_email: string | null;
  office_hours: string | null;
  phone: string | null;
  status: FacultyStatus;
}

export interface Faculty {
  id: string;
  departmentId: string;
  name: string;
  title: string | null;
  photoUrl: string | null;
  biography: string | null;
  researchInterests: string | null;
  contactEmail: string | null;
  officeHours: string | null;
  phone: string | null;
  status: FacultyStatus;
}

export type FacultyCreateInput = Omit<Faculty, 'id'>;

export interface FacultyStore {
  /** Ordered by name; omit departmentId for every department */
  list(departmentId?: string): Promise<Faculty[]>;
  findById(id: string): Promise<Faculty | null>;
  create(input: FacultyCreateInput): Promise<Faculty>;
}

function rowToFaculty(row: FacultyRow): Faculty {
  return {
    id: row.id,
    departmentId: row.department_id,
    name: row.name,
    title: row.title,
    photoUrl: row.photo_url,
    biography: row.biography,
    researchInterests: row.research_interests,
    contactEmail: row.contact_email,
    officeHours: row.office_hours,
    phone: row.phone,
    status: row.status,
  };
}

export class FacultyRepository implements FacultyStore {
  constructor(private pool: Pool) {}

  async list(departmentId?: string): Promise<Faculty[]> {
    const result = departmentId
      ? await this.pool.query<FacultyRow>('SELECT * FROM faculty WHERE department_id = $1 ORDER BY name ASC', [
          departmentId,
        ])
      : await this.pool.query<FacultyRow>('SELECT * FROM faculty ORDER BY name ASC');
    return result.rows.map(rowToFaculty);
  }

  async findById(id: string): Promise<Faculty | null> {
    const result = await this.pool.query<FacultyRow>('SELECT * FROM faculty WHERE id = $1', [id]);
    return result.rows.length > 0 ? rowToFaculty(result.rows[0]) : null;
  }

  async create(input: FacultyCreateInput): Promise<Faculty> {
    const result = await this.pool.query<FacultyRow>(
      `
        INSERT INTO faculty (
          department_id, name, title, photo_url, biography, research_interests,
          contact_email, office_hours, phone, status
        ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)
        RETURNING *
      `,
      [
        input.departmentId,
        input.name,
        input.title,
        input.photoUrl,
        input.biography,
        input.researchInterests,
        input.contactEmail,
        input.officeHours,
        input.phone,
        input.status,
      ]
    );

    const faculty = rowToFaculty(result.rows[0]);
    logDatabaseOperation('insert', 'faculty', { facultyId: faculty.id, departmentId: faculty.departmentId });
    return faculty;
  }
}
