import { drizzle } from "drizzle-orm/postgres-js";
import postgres from "postgres";
import * as schema from "./schema.js";

export interface DbOptions {
  /** Pool size. Defaults to 10. */
  maxConnections?: number;
}

/**
 * Create a read-side Drizzle client over postgres.js. The pool is reachable
 * as `db.$client` for shutdown.
 */
export function createDb(url: string, options: DbOptions = {}) {
  const client = postgres(url, { max: options.maxConnections ?? 10 });
  return drizzle(client, { schema });
}

export type Database = ReturnType<typeof createDb>;
