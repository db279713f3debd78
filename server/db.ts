import { drizzle, type NodePgDatabase } from "drizzle-orm/node-postgres";
import type { Logger as DrizzleLogger } from "drizzle-orm/logger";
import pg from "pg";
import * as schema from "../packages/shared/schema/index";
import type { AppConfig } from "./config/env";
import logger from "./logger";

const { Pool } = pg;

type DatabaseSchema = typeof schema;
type Database = NodePgDatabase<DatabaseSchema>;

/**
 * Error thrown when the database is not configured or unreachable.
 * Route handlers map this to a 503 response.
 */
export class DatabaseUnavailableError extends Error {
  constructor(message = "Database not configured", options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DatabaseUnavailableError";
  }
}

/** Routes drizzle's query log into the app logger when SQL_ECHO is on. */
class SqlEchoLogger implements DrizzleLogger {
  logQuery(query: string, params: unknown[]): void {
    logger.debug("sql", { query, params });
  }
}

export interface DatabaseHandle {
  db: Database;
  pool: pg.Pool;
  close(): Promise<void>;
}

export function createDatabase(config: AppConfig["database"]): DatabaseHandle {
  if (!config.url) {
    throw new DatabaseUnavailableError();
  }

  const pool = new Pool({
    connectionString: config.url,
    max: config.poolMax,
    idleTimeoutMillis: config.idleTimeoutMs,
    connectionTimeoutMillis: config.connectionTimeoutMs,
  });

  // Prevent unhandled rejections from idle clients disconnecting
  pool.on("error", (err) => {
    logger.error("Unexpected error on idle database client", {
      error: err instanceof Error ? err.message : String(err),
    });
  });

  const db = drizzle(pool, {
    schema,
    logger: config.echo ? new SqlEchoLogger() : false,
  });

  logger.info("Database connection pool created", {
    max: config.poolMax,
    idleTimeoutMillis: config.idleTimeoutMs,
    connectionTimeoutMillis: config.connectionTimeoutMs,
  });

  return {
    db,
    pool,
    close: () => pool.end(),
  };
}

export type { Database };
