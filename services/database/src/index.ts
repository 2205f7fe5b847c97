import { Database, loadDatabaseConfig } from './database';
import { DocumentStore, InMemoryDocumentStore } from './documentStore';
import { PostgresDocumentStore } from './postgresDocumentStore';

export * from './database';
export * from './documentStore';
export * from './postgresDocumentStore';
export { runMigrations, getMigrationStatus } from './migrations/migrationSystem';

/**
 * PostgreSQL-backed store when `DB_HOST` is configured, otherwise an in-memory store
 * (records are lost when the process exits).
 */
export function createDocumentStore(env: NodeJS.ProcessEnv = process.env): {
  store: DocumentStore;
  database?: Database;
} {
  if (env.DB_HOST) {
    const database = new Database(loadDatabaseConfig(env));
    return { store: new PostgresDocumentStore(database), database };
  }
  return { store: new InMemoryDocumentStore() };
}
