import pg from "pg";
import type { QueryResult, QueryResultRow } from "pg";
import type { DatabaseConfig } from "../config/app.config.js";

export type QueryFn = <R extends QueryResultRow>(
  text: string,
  params?: unknown[],
) => Promise<QueryResult<R>>;

export function createPool(config: DatabaseConfig): pg.Pool {
  const pool = new pg.Pool({
    user: config.user,
    password: config.password,
    database: config.database,
    host: config.host,
    port: config.port,
    connectionTimeoutMillis: 5000,
  });

  // Idle clients can lose their connection when the server restarts.
  pool.on("error", (error) => {
    console.error("❌ Idle database client error:", error.message);
  });

  return pool;
}

export function createQuery(pool: pg.Pool): QueryFn {
  return function query<R extends QueryResultRow>(
    text: string,
    params?: unknown[],
  ): Promise<QueryResult<R>> {
    return pool.query<R>(text, params);
  };
}
