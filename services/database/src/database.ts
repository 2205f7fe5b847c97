import { Pool, PoolClient, QueryResult, QueryResultRow } from 'pg';
import { z } from 'zod';
import { createLogger, envInteger, loadConfig } from '@ledgerline/shared-utils';

const logger = createLogger('database');

export interface DatabaseConfig {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
}

const databaseEnvSchema = z.object({
  DB_HOST: z.string().default('localhost'),
  DB_PORT: envInteger(5432),
  DB_NAME: z.string().default('ledgerline'),
  DB_USER: z.string().default('postgres'),
  DB_PASSWORD: z.string().default('postgres'),
});

export function loadDatabaseConfig(env: NodeJS.ProcessEnv = process.env): DatabaseConfig {
  const parsed = loadConfig(databaseEnvSchema, env);
  return {
    host: parsed.DB_HOST,
    port: parsed.DB_PORT,
    database: parsed.DB_NAME,
    user: parsed.DB_USER,
    password: parsed.DB_PASSWORD,
  };
}

/** The slice of a pg pool or client the stores need. */
export interface Queryable {
  query(text: string, params?: unknown[]): Promise<{ rows: QueryResultRow[] }>;
}

export class Database implements Queryable {
  private pool: Pool;

  constructor(config: Partial<DatabaseConfig> = {}) {
    const resolved = { ...loadDatabaseConfig(), ...config };
    this.pool = new Pool({
      ...resolved,
      max: 20,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 2000,
    });
  }

  async query<T extends QueryResultRow = QueryResultRow>(text: string, params?: unknown[]): Promise<QueryResult<T>> {
    const start = Date.now();
    try {
      const result = await this.pool.query<T>(text, params);
      logger.debug('Executed query', { text, duration: Date.now() - start, rows: result.rowCount });
      return result;
    } catch (error) {
      logger.error('Query error', error instanceof Error ? error : new Error(String(error)), { text });
      throw error;
    }
  }

  async getClient(): Promise<PoolClient> {
    return this.pool.connect();
  }

  async transaction<T>(callback: (client: PoolClient) => Promise<T>): Promise<T> {
    const client = await this.getClient();
    try {
      await client.query('BEGIN');
      const result = await callback(client);
      await client.query('COMMIT');
      return result;
    } catch (error) {
      await client.query('ROLLBACK');
      throw error;
    } finally {
      client.release();
    }
  }

  async healthCheck(): Promise<boolean> {
    try {
      const result = await this.query('SELECT 1');
      return result.rows.length > 0;
    } catch (error) {
      logger.warn('Database health check failed', { error: error instanceof Error ? error.message : String(error) });
      return false;
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
