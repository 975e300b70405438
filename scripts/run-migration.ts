/**
 * Run Database Migrations
 *
 * Applies every migrations/*.sql file in name order, each inside its own transaction,
 * then checks that the portal tables exist.
 *
 * Usage:
 *   npm run migrate
 */

import '../shared/config/global-env';
import { readFileSync, readdirSync } from 'fs';
import { join } from 'path';
import { createPostgresPool, withTransaction } from '../shared/databases/postgres/connection';
import { isPostgresError } from '../shared/config/errorHandler';

const MIGRATIONS_DIR = join(__dirname, '../migrations');

const EXPECTED_TABLES = [
  'users',
  'departments',
  'faculty',
  'study_materials',
  'upload_audits',
  'timetable_entries',
  'notifications',
  'coordinators',
  'search_query_logs',
  'user_favorite_materials',
  'recently_viewed_materials',
];

async function runMigrations(): Promise<void> {
  console.log('🚀 Starting campus portal migrations...\n');

  const pool = createPostgresPool({ max: 1, applicationName: 'campus-portal-migrate' });

  try {
    const files = readdirSync(MIGRATIONS_DIR)
      .filter((file) => file.endsWith('.sql'))
      .sort();

    for (const file of files) {
      const migrationPath = join(MIGRATIONS_DIR, file);
      console.log(`⚙️  Applying ${file}`);
      const sql = readFileSync(migrationPath, 'utf-8');
      await withTransaction(pool, async (client) => {
        await client.query(sql);
      });
    }
    console.log(`\n✅ Applied ${files.length} migration file(s)\n`);

    console.log('🔍 Verifying tables...');
    const result = await pool.query<{ table_name: string }>(
      `SELECT table_name FROM information_schema.tables WHERE table_schema = 'public' AND table_name = ANY($1)`,
      [EXPECTED_TABLES]
    );
    const present = new Set(result.rows.map((row) => row.table_name));
    const missing = EXPECTED_TABLES.filter((table) => !present.has(table));

    if (missing.length > 0) {
      console.error(`   ⚠️  Missing tables: ${missing.join(', ')}`);
      process.exitCode = 1;
    } else {
      console.log(`   ✅ All ${EXPECTED_TABLES.length} tables present`);
    }
  } catch (error) {
    console.error('\n❌ Migration failed!');
    console.error(`   Error: ${error instanceof Error ? error.message : String(error)}`);
    if (isPostgresError(error)) {
      console.error(`   Code: ${error.code}`);
    }
    process.exitCode = 1;
  } finally {
    await pool.end();
    console.log('\n🔌 Database connection closed');
  }
}

runMigrations().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
