/**
 * User Model - PostgreSQL
 * Portal accounts; identity issuance lives elsewhere, this only provisions rows
 */

import type { Pool } from 'pg';
import type { PortalRole } from '@campus-portal/shared/types/caller';
import { logDatabaseOperation } from '@campus-portal/shared/config/logger';

export const PORTAL_ROLES: readonly PortalRole[] = ['student', 'cr', 'faculty', 'authority', 'moderator'];

interface UserRow {
  id: string;
  email: string;
  name: string;
  role: PortalRole;
  phone: string | null;
  telegram_id: string | null;
  whatsapp_number: string | null;
  is_staff: boolean;
  is_superuser: boolean;
  created_at: Date;
}

export interface User {
  id: string;
  email: string;
  name: string;
  role: PortalRole;
  phone: string | null;
  telegramId: string | null;
  whatsappNumber: string | null;
  isStaff: boolean;
  isSuperuser: boolean;
  createdAt: Date;
}

export type UserCreateInput = Omit<User, 'id' | 'createdAt'>;

export interface UserStore {
  /** Rejects with a unique violation when the email is taken (case-insensitive) */
  create(input: UserCreateInput): Promise<User>;
  findById(id: string): Promise<User | null>;
}

function rowToUser(row: UserRow): User {
  return {
    id: row.id,
    email: row.email,
    name: row.name,
    role: row.role,
    phone: row.phone,
    telegramId: row.telegram_id,
    whatsappNumber: row.whatsapp_number,
    isStaff: row.is_staff,
    isSuperuser: row.is_superuser,
    createdAt: row.created_at,
  };
}

export class UserRepository implements UserStore {
  constructor(private pool: Pool) {}

  async create(input: UserCreateInput): Promise<User> {
    const result = await this.pool.query<UserRow>(
      `
        INSERT INTO users (email, name, role, phone, telegram_id, whatsapp_number, is_staff, is_superuser)
        VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
        RETURNING *
      `,
      [
        input.email,
        input.name,
        input.role,
        input.phone,
        input.telegramId,
        input.whatsappNumber,
        input.isStaff,
        input.isSuperuser,
      ]
    );

    const user = rowToUser(result.rows[0]);
    logDatabaseOperation('insert', 'users', { userId: user.id, role: user.role });
    return user;
  }

  async findById(id: string): Promise<User | null> {
    const result = await this.pool.query<UserRow>('SELECT * FROM users WHERE id = $1', [id]);
    return result.rows.length > 0 ? rowToUser(result.rows[0]) : null;
  }
}
