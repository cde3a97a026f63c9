import { createDb, type Database } from "@notify-relay/db";
import { config } from "./config.js";
import { log } from "./logger.js";

export type { Database };

/**
 * Postgres connection pool for content lookups and result records.
 * Each message does at most one read and one upsert.
 */
export function connectDatabase(): { db: Database; close: () => Promise<void> } {
  const connection = createDb(config.DATABASE_URL, { max: config.DATABASE_POOL_MAX });
  log.db.info({ poolMax: config.DATABASE_POOL_MAX }, "database pool created");
  return connection;
}
