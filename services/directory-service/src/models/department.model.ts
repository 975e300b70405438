/**
 * Department Model - PostgreSQL
 */

import type { Pool } from 'pg';
import { z } from 'zod';
import { logDatabaseOperation } from '@campus-portal/shared/config/logger';

interface DepartmentRow {
  id: string;
  name: string;
  short_code: string;
  description: string | null;
  contact_emails: unknown;
  created_at: Date;
}

export interface Department {
  id: string;
  name: string;
  shortCode: string;
  description: string | null;
  contactEmails: string[];
  createdAt: Date;
}

export interface DepartmentCreateInput {
  name: string;
  shortCode: string;
  description?: string;
  contactEmails: string[];
}

export interface DepartmentStore {
  /** Ordered by name */
  list(): Promise<Department[]>;
  /** Accepts a department id or its short code (case-insensitive) */
  resolve(reference: string): Promise<Department | null>;
  create(input: DepartmentCreateInput): Promise<Department>;
}

const uuidSchema = z.string().uuid();

export function isUuid(value: string): boolean {
  return uuidSchema.safeParse(value).success;
}

function rowToDepartment(row: DepartmentRow): Department {
  return {
    id: row.id,
    name: row.name,
    shortCode: row.short_code,
    description: row.description,
    contactEmails: Array.isArray(row.contact_emails)
      ? row.contact_emails.filter((email): email is string => typeof email === 'string')
      : [],
    createdAt: row.created_at,
  };
}

export class DepartmentRepository implements DepartmentStore {
  constructor(private pool: Pool) {}

  async list(): Promise<Department[]> {
    const result = await this.pool.query<DepartmentRow>('SELECT * FROM departments ORDER BY name ASC');
    return result.rows.map(rowToDepartment);
  }

  async resolve(reference: string): Promise<Department | null> {
    const trimmed = reference.trim();
    if (!trimmed) {
      return null;
    }

    const query = isUuid(trimmed)
      ? 'SELECT * FROM departments WHERE id = $1'
      : 'SELECT * FROM departments WHERE UPPER(short_code) = UPPER($1)';

    const result = await this.pool.query<DepartmentRow>(query, [trimmed]);
    return result.rows.length > 0 ? rowToDepartment(result.rows[0]) : null;
  }

  async create(input: DepartmentCreateInput): Promise<Department> {
    const result = await this.pool.query<DepartmentRow>(
      `
        INSERT INTO departments (name, short_code, description, contact_emails)
        VALUES ($1, $2, $3, $4::jsonb)
        RETURNING *
      `,
      [input.name, input.shortCode, input.description || null, JSON.stringify(input.contactEmails)]
    );

    const department = rowToDepartment(result.rows[0]);
    logDatabaseOperation('insert', 'departments', { departmentId: department.id });
    return department;
  }
}
