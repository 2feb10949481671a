import postgres from 'postgres';
import type { DatabaseConfig } from '../config';

/**
 * PostgreSQL connection pool.
 *
 * One pool per process, created by the composition root and shared by the
 * pgvector index and the health check.
 */
export function createSql(config: DatabaseConfig): postgres.Sql {
  return postgres({
    host: config.host,
    port: config.port,
    database: config.database,
    user: config.user,
    password: config.password,
    max: config.max,
    idle_timeout: 20,
    connect_timeout: 10,
    onnotice: () => undefined,
  });
}

/**
 * Health check: verify database connectivity.
 */
export async function checkDatabaseHealth(sql: postgres.Sql): Promise<boolean> {
  try {
    await sql`SELECT 1`;
    return true;
  } catch {
    return false;
  }
}
