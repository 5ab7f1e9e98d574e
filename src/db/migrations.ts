import fs from 'node:fs/promises';
import path from 'node:path';
import type { Client } from 'pg';
import { z } from 'zod';

const MIGRATIONS_TABLE = 'schema_migrations';

type MigrationRow = {
  id: number;
  filename: string;
  applied_at: string;
};

export type MigrationSummary = {
  appliedCount: number;
  skippedCount: number;
};

export async function ensureMigrationsTable(client: Client): Promise<void> {
  await client.query(`
    CREATE TABLE IF NOT EXISTS ${MIGRATIONS_TABLE} (
      id SERIAL PRIMARY KEY,
      filename TEXT NOT NULL UNIQUE,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT now()
    );
  `);
}

export async function loadAppliedMigrations(client: Client): Promise<MigrationRow[]> {
  const { rows } = await client.query<MigrationRow>(
    `SELECT id, filename, applied_at FROM ${MIGRATIONS_TABLE} ORDER BY id ASC;`
  );
  return rows;
}

export async function listMigrationFiles(dir: string): Promise<string[]> {
  const entries = await fs.readdir(dir);
  return entries.filter((file) => file.endsWith('.sql')).sort();
}

export async function readMigrationSql(dir: string, file: string): Promise<string> {
  return fs.readFile(path.join(dir, file), 'utf8');
}

export async function recordMigration(client: Client, file: string): Promise<void> {
  await client.query(`INSERT INTO ${MIGRATIONS_TABLE} (filename) VALUES ($1)`, [file]);
}

/** Objects the bot queries; each must exist in `public` once migrations ran. */
export const REQUIRED_OBJECTS = [
  { kind: 'table', name: 'reminders' },
  { kind: 'table', name: 'mention_targets' },
  { kind: 'function', name: 'replace_reminder' }
] as const;

export type RequiredObject = (typeof REQUIRED_OBJECTS)[number];

export class SchemaSyncError extends Error {
  readonly file: string | null;

  constructor(message: string, file: string | null = null) {
    super(message);
    this.name = 'SchemaSyncError';
    this.file = file;
  }
}

export type Queryable = {
  query(text: string, values: unknown[]): Promise<{ rows: unknown[] }>;
};

const existsRowSchema = z.object({ ok: z.boolean() });

const EXISTS_SQL: Record<RequiredObject['kind'], string> = {
  table: `SELECT to_regclass('public.' || $1) IS NOT NULL AS ok`,
  function: `SELECT EXISTS (
    SELECT 1 FROM pg_proc p JOIN pg_namespace n ON n.oid = p.pronamespace
    WHERE n.nspname = 'public' AND p.proname = $1
  ) AS ok`
};

const objectExists = async (client: Queryable, object: RequiredObject): Promise<boolean> => {
  const { rows } = await client.query(EXISTS_SQL[object.kind], [object.name]);
  const parsed = existsRowSchema.safeParse(rows[0]);
  return parsed.success && parsed.data.ok;
};

/** Throws `SchemaSyncError` naming every required object that is missing. */
export async function verifySchema(client: Queryable): Promise<void> {
  const missing: string[] = [];
  for (const object of REQUIRED_OBJECTS) {
    if (!(await objectExists(client, object))) missing.push(`${object.kind} public.${object.name}`);
  }
  if (missing.length > 0) {
    throw new SchemaSyncError(`Schema is missing ${missing.join(', ')}`);
  }
}
