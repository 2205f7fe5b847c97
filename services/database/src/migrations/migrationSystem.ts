import { readdir, readFile } from 'fs/promises';
import { join } from 'path';
import { createLogger } from '@ledgerline/shared-utils';
import { Database } from '../database';

const logger = createLogger('database-migrations');

const MIGRATIONS_DIR = __dirname;

async function ensureMigrationsTable(database: Database): Promise<void> {
  await database.query(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      version VARCHAR(255) PRIMARY KEY,
      applied_at TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT NOW()
    )
  `);
}

async function getAppliedMigrations(database: Database): Promise<string[]> {
  const result = await database.query<{ version: string }>('SELECT version FROM schema_migrations ORDER BY version');
  return result.rows.map((row) => row.version);
}

async function listMigrationVersions(directory: string): Promise<string[]> {
  const files = await readdir(directory);
  return files
    .filter((file) => file.endsWith('.sql'))
    .map((file) => file.replace(/\.sql$/, ''))
    .sort();
}

export async function runMigrations(database: Database, directory: string = MIGRATIONS_DIR): Promise<string[]> {
  await ensureMigrationsTable(database);
  const applied = new Set(await getAppliedMigrations(database));
  const newlyApplied: string[] = [];

  for (const version of await listMigrationVersions(directory)) {
    if (applied.has(version)) {
      logger.debug('Migration already applied', { version });
      continue;
    }

    const sql = await readFile(join(directory, `${version}.sql`), 'utf-8');
    logger.info('Applying migration', { version });
    await database.transaction(async (client) => {
      await client.query(sql);
      await client.query('INSERT INTO schema_migrations (version) VALUES ($1)', [version]);
    });
    newlyApplied.push(version);
  }

  logger.info('All migrations completed', { applied: newlyApplied.length });
  return newlyApplied;
}

export async function getMigrationStatus(
  database: Database,
  directory: string = MIGRATIONS_DIR
): Promise<{ applied: string[]; pending: string[] }> {
  await ensureMigrationsTable(database);
  const applied = await getAppliedMigrations(database);
  const pending = (await listMigrationVersions(directory)).filter((version) => !applied.includes(version));
  return { applied, pending };
}
