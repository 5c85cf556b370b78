import pg from "pg";
import { config, DEFAULT_PIPELINE_OPTIONS } from "../config.js";
import { createLogger } from "../logger.js";

const log = createLogger("db");

let pool: pg.Pool | null = null;

/**
 * Shared pool. Every statement is bounded by the server-side statement_timeout
 * and the client-side query_timeout so a stalled call fails instead of hanging.
 */
export function getPool(queryTimeoutMs: number = DEFAULT_PIPELINE_OPTIONS.queryTimeoutMs): pg.Pool {
  if (!pool) {
    const connection = config.databaseUrl
      ? { connectionString: config.databaseUrl }
      : config.dbConfig;
    pool = new pg.Pool({
      ...connection,
      statement_timeout: queryTimeoutMs,
      query_timeout: queryTimeoutMs,
      connectionTimeoutMillis: queryTimeoutMs,
    });
    pool.on("error", (err) => {
      log.error("Unexpected database pool error", { error: err.message });
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
