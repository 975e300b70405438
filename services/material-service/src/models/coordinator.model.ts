import type { Pool } from 'pg';

/**
 * Capability query backing the verifier check
 */
export interface UserRoleDirectory {
  hasCoordinatorRole(userId: string): Promise<boolean>;
}

export class CoordinatorRepository implements UserRoleDirectory {
  constructor(private pool: Pool) {}

  async hasCoordinatorRole(userId: string): Promise<boolean> {
    const result = await this.pool.query<{ has_role: boolean }>(
      'SELECT EXISTS (SELECT 1 FROM coordinators WHERE user_id = $1) AS has_role',
      [userId]
    );
    return result.rows[0]?.has_role === true;
  }
}
