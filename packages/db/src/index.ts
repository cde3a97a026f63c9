import { drizzle } from "drizzle-orm/postgres-js";
import type { PgDatabase, PgQueryResultHKT } from "drizzle-orm/pg-core";
import postgres from "postgres";
import * as schema from "./schema.js";

export * from "./schema.js";
export { schema };

export interface CreateDbOptions {
  /** Maximum pooled connections (default: 20) */
  max?: number;
}

/** Driver-agnostic handle; postgres-js in production, an in-process proxy in tests */
export type Database = PgDatabase<PgQueryResultHKT, typeof schema>;

export function createDb(databaseUrl: string, options: CreateDbOptions = {}): { db: Database; close: () => Promise<void> } {
  const sql = postgres(databaseUrl, {
    max: options.max ?? 20,
    idle_timeout: 30,           // Close idle connections after 30 seconds
    connect_timeout: 10,        // Connection timeout in seconds
    max_lifetime: 60 * 30,      // Max connection lifetime (30 minutes)
    prepare: false,
  });

  return {
    db: drizzle(sql, { schema }),
    close: () => sql.end({ timeout: 5 }),
  };
}
