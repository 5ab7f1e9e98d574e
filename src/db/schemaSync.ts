import path from 'node:path';
import { Client } from 'pg';
import { config } from '../config';
import { errorMessage, logError, logInfo } from '../utils/logger';
import {
  SchemaSyncError,
  ensureMigrationsTable,
  listMigrationFiles,
  loadAppliedMigrations,
  readMigrationSql,
  recordMigration,
  verifySchema,
  type MigrationSummary
} from './migrations';

const MIGRATIONS_DIR = path.join(process.cwd(), 'db', 'migrations');

export type SchemaSyncResult = MigrationSummary & { durationMs: number };

async function applyPending(client: Client): Promise<MigrationSummary> {
  await ensureMigrationsTable(client);
  const applied = new Set((await loadAppliedMigrations(client)).map((migration) => migration.filename));
  const pending = (await listMigrationFiles(MIGRATIONS_DIR)).filter((file) => !applied.has(file));

  for (const file of pending) {
    const sql = await readMigrationSql(MIGRATIONS_DIR, file);
    logInfo('Applying migration', { scope: 'schemaSync', file });

    await client.query('BEGIN');
    try {
      await client.query(sql);
      await recordMigration(client, file);
      await client.query('COMMIT');
    } catch (error) {
      await client.query('ROLLBACK');
      logError('Migration failed', { scope: 'schemaSync', file, error: errorMessage(error) });
      throw new SchemaSyncError(`Migration failed (${file}): ${errorMessage(error)}`, file);
    }
  }

  return { appliedCount: pending.length, skippedCount: applied.size };
}

export async function schemaSync(): Promise<SchemaSyncResult> {
  if (!config.db.migrationsEnabled) {
    logInfo('Schema sync skipped (DB_MIGRATIONS_ENABLED=false)', { scope: 'schemaSync' });
    return { appliedCount: 0, skippedCount: 0, durationMs: 0 };
  }

  const { connectionString } = config.db;
  if (!connectionString) {
    throw new SchemaSyncError('SUPABASE_DB_CONNECTION is required for schema sync');
  }

  const startedAt = Date.now();
  const client = new Client({ connectionString });
  await client.connect();

  try {
    const summary = await applyPending(client);
    await verifySchema(client);
    return { ...summary, durationMs: Date.now() - startedAt };
  } finally {
    await client.end();
  }
}
