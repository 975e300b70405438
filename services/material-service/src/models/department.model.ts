/**
 * Department lookups used by the material listing filters.
 * Departments are owned by directory-service; this side only reads them.
 */

import type { Pool } from 'pg';
import { z } from 'zod';

interface DepartmentSummaryRow {
  id: string;
  name: string;
  short_code: string;
}

export interface DepartmentSummary {
  id: string;
  name: string;
  shortCode: string;
}

export interface DepartmentLookup {
  /** Accepts a department id or its short code */
  resolve(reference: string): Promise<DepartmentSummary | null>;
}

const uuidSchema = z.string().uuid();

export function isUuid(value: string): boolean {
  return uuidSchema.safeParse(value).success;
}

function rowToDepartment(row: DepartmentSummaryRow): DepartmentSummary {
  return {
    id: row.id,
    name: row.name,
    shortCode: row.short_code,
  };
}

export class DepartmentRepository implements DepartmentLookup {
  constructor(private pool: Pool) {}

  async resolve(reference: string): Promise<DepartmentSummary | null> {
    const trimmed = reference.trim();
    if (!trimmed) {
      return null;
    }

    const query = isUuid(trimmed)
      ? 'SELECT id, name, short_code FROM departments WHERE id = $1'
      : 'SELECT id, name, short_code FROM departments WHERE UPPER(short_code) = UPPER($1)';

    const result = await this.pool.query<DepartmentSummaryRow>(query, [trimmed]);
    return result.rows.length > 0 ? rowToDepartment(result.rows[0]) : null;
  }
}
