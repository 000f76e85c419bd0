import { readFile, readdir } from "node:fs/promises";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import type { ClickHouseClient } from "@clickhouse/client";
import { ErrorCode, SightlineError } from "@sightline/shared/errors";
import { createClickHouseClient } from "./clickhouse-client.js";
import { parseMigrationFilename, splitStatements } from "./migrate-clickhouse-helpers.js";

/** Migrations live alongside this package: packages/db/migrations/clickhouse/ */
export const CLICKHOUSE_MIGRATIONS_DIR = join(
  fileURLToPath(import.meta.url),
  "..",
  "..",
  "migrations",
  "clickhouse",
);

export interface MigrationSource {
  list(): Promise<string[]>;
  read(file: string): Promise<string>;
}

/** Read `.sql` migration files from a directory, sorted by filename. */
export function directorySource(dir: string): MigrationSource {
  return {
    list: async () => (await readdir(dir)).filter((f) => f.endsWith(".sql")).sort(),
    read: (file) => readFile(join(dir, file), "utf-8"),
  };
}

/**
 * Apply every pending migration and record it in `schema_migrations`.
 * Returns the versions applied by this run.
 *
 * 0001 creates the tracking table itself; it is bootstrapped up front and
 * only recorded when encountered.
 */
export async function runClickHouseMigrations(
  client: ClickHouseClient,
  source: MigrationSource,
  log: (msg: string) => void = () => {},
): Promise<string[]> {
  await client.command({
    query: `
      CREATE TABLE IF NOT EXISTS schema_migrations (
        version     String,
        applied_at  DateTime64(3, 'UTC') DEFAULT now64(3)
      )
      ENGINE = MergeTree()
      ORDER BY version
    `,
  });

  const result = await client.query({
    query: "SELECT version FROM schema_migrations",
    format: "JSONEachRow",
  });
  const applied = new Set((await result.json<{ version: string }>()).map((r) => r.version));

  const appliedNow: string[] = [];
  for (const file of await source.list()) {
    const { version } = parseMigrationFilename(file);
    if (applied.has(version)) continue;

    if (version !== "0001") {
      log(`Applying ${file}…`);
      for (const stmt of splitStatements(await source.read(file))) {
        await client.command({ query: stmt });
      }
    }

    await client.insert({
      table: "schema_migrations",
      values: [{ version }],
      format: "JSONEachRow",
    });
    appliedNow.push(version);
  }

  return appliedNow;
}

async function main() {
  const client = createClickHouseClient();
  const dir = process.env.CLICKHOUSE_MIGRATIONS_DIR || CLICKHOUSE_MIGRATIONS_DIR;
  const log = (msg: string) => console.log(`[migrate:clickhouse] ${msg}`);
  log(`Connecting to ClickHouse, migrations from ${dir}…`);

  try {
    const applied = await runClickHouseMigrations(client, directorySource(dir), log);
    log(
      applied.length === 0
        ? "No pending migrations."
        : `Done: ${applied.length} migration(s) applied.`,
    );
  } finally {
    await client.close();
  }
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  main().catch((err: unknown) => {
    const error =
      err instanceof SightlineError
        ? err
        : new SightlineError(
            ErrorCode.DB.CH_MIGRATION_FAILED,
            err instanceof Error ? err.message : "ClickHouse migration failed",
            500,
          );
    console.error(`[migrate:clickhouse] ${error.code}: ${error.message}`);
    process.exit(1);
  });
}
