import { Pool } from "pg";
import { config } from "../../config";

let pool: Pool | null = null;

export function getPool(): Pool {
  if (!pool) {
    pool = new Pool({
      connectionString: config.DATABASE_URL,
      max: config.DB_POOL_SIZE,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 2000,
      statement_timeout: config.DB_QUERY_TIMEOUT_MS,
      lock_timeout: config.DB_LOCK_TIMEOUT_MS,
      query_timeout: config.DB_QUERY_TIMEOUT_MS
    });
  }

  return pool;
}

export async function closePool(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
  }
}
