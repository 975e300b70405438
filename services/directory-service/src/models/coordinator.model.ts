/**
 * Coordinator Model - PostgreSQL
 * Class representatives and department coordinators; one row per (user, department, role)
 */

import type { Pool } from 'pg';
import { logDatabaseOperation } from '@campus-portal/shared/config/logger';

export type CoordinatorRole = 'cr' | 'coordinator';

export const COORDINATOR_ROLES: readonly CoordinatorRole[] = ['cr', 'coordinator'];

interface CoordinatorRow {
  id: string;
  user_id: string;
  user_name: string;
  user_email: string;
  department_id: string;
  role: CoordinatorRole;
  contact_info: string | null;
}

export interface Coordinator {
  id: string;
  userId: string;
  userName: string;
  userEmail: string;
  departmentId: string;
  role: CoordinatorRole;
  contactInfo: string | null;
}

export interface CoordinatorCreateInput {
  userId: string;
  departmentId: string;
  role: CoordinatorRole;
  contactInfo?: string;
}

export interface CoordinatorStore {
  /** Ordered by role, then user name */
  listForDepartment(departmentId: string): Promise<Coordinator[]>;
  /** Rejects with a unique violation when the assignment already exists */
  create(input: CoordinatorCreateInput): Promise<Coordinator>;
}

function rowToCoordinator(row: CoordinatorRow): Coordinator {
  return {
    id: row.id,
    userId: row.user_id,
    userName: row.user_name,
    userEmail: row.user_email,
    departmentId: row.department_id,
    role: row.role,
    contactInfo: row.contact_info,
  };
}

export class CoordinatorRepository implements CoordinatorStore {
  constructor(private pool: Pool) {}

  async listForDepartment(departmentId: string): Promise<Coordinator[]> {
    const result = await this.pool.query<CoordinatorRow>(
      `
        SELECT c.*, u.name AS user_name, u.email AS user_email
        FROM coordinators c
        JOIN users u ON u.id = c.user_id
        WHERE c.department_id = $1
        ORDER BY c.role ASC, u.name ASC
      `,
      [departmentId]
    );
    return result.rows.map(rowToCoordinator);
  }

  async create(input: CoordinatorCreateInput): Promise<Coordinator> {
    const result = await this.pool.query<CoordinatorRow>(
      `
        WITH inserted AS (
          INSERT INTO coordinators (user_id, department_id, role, contact_info)
          VALUES ($1, $2, $3, $4)
          RETURNING *
        )
        SELECT inserted.*, u.name AS user_name, u.email AS user_email
        FROM inserted
        JOIN users u ON u.id = inserted.user_id
      `,
      [input.userId, input.departmentId, input.role, input.contactInfo || null]
    );

    const coordinator = rowToCoordinator(result.rows[0]);
    logDatabaseOperation('insert', 'coordinators', {
      coordinatorId: coordinator.id,
      departmentId: coordinator.departmentId,
      role: coordinator.role,
    });
    return coordinator;
  }
}
