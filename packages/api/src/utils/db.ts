import postgres from 'postgres';

/**
 * PostgreSQL connection pool (pgvector).
 *
 * Read-only from this service's perspective: chunks and documents are
 * written by the ingestion pipeline.
 */

export type Sql = postgres.Sql;

export function createSql(databaseUrl: string, connectTimeoutSeconds: number): Sql {
  return postgres(databaseUrl, {
    max: 20, // Maximum pool size
    idle_timeout: 20,
    connect_timeout: connectTimeoutSeconds,
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
