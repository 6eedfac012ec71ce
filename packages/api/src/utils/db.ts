import postgres from 'postgres';
import type { AppConfig } from '../config';

/**
 * PostgreSQL connection pool.
 *
 * Used by:
 * - Retrieval service (pgvector similarity search over document chunks)
 * - Learned answer store (upserts keyed by normalized question)
 */

export type Sql = postgres.Sql;

export function createSql(database: AppConfig['database']): Sql {
  return postgres({
    host: database.host,
    port: database.port,
    database: database.database,
    user: database.user,
    password: database.password,
    max: 20, // Maximum pool size
    idle_timeout: 20,
    connect_timeout: 10,
  });
}

/**
 * Health check: verify database connectivity.
 */
export async function checkDatabaseHealth(sql: Sql): Promise<boolean> {
  try {
    await sql`SELECT 1`;
    return true;
  } catch {
    return false;
  }
}
