import { randomUUID } from "node:crypto";
import type { ClickHouseClient } from "@clickhouse/client";
import { createClickHouseClient } from "@sightline/db/clickhouse";
import { createDb } from "@sightline/db/client";
import type { Database } from "@sightline/db/client";
import { ErrorCode, SightlineError } from "@sightline/shared/errors";
import Fastify, { type FastifyInstance } from "fastify";
import { ClickHouseEventStore } from "./lib/stores/clickhouse-event-store.js";
import { PgActionStore } from "./lib/stores/pg-action-store.js";
import { PgPeopleStore } from "./lib/stores/pg-people-store.js";
import type { ActionStore, EventStore, PeopleStore } from "./lib/stores/types.js";
import { errorHandlerPlugin } from "./plugins/error-handler.js";
import { healthPlugin } from "./plugins/health.js";
import { peoplePlugin } from "./plugins/people.js";
import { trendsPlugin } from "./plugins/trends.js";
import "./types.js";

export interface CreateAppOptions {
  /** PostgreSQL connection URL. Ignored if `db` is provided. */
  databaseUrl?: string;
  /** PostgreSQL pool size. Ignored if `db` is provided. */
  databasePoolMax?: number;
  /** ClickHouse connection URL. Ignored if `clickhouse` is provided. */
  clickhouseUrl?: string;
  /** Per-query ClickHouse timeout. Ignored if `clickhouse` is provided. */
  clickhouseRequestTimeoutMs?: number;
  /** Pre-built Drizzle database instance (for testing). */
  db?: Database;
  /** Pre-built ClickHouse client instance (for testing). */
  clickhouse?: ClickHouseClient;
  /** Pre-built stores (for testing). Default to the ClickHouse/PostgreSQL ones. */
  eventStore?: EventStore;
  actionStore?: ActionStore;
  peopleStore?: PeopleStore;
  /** Enable Fastify request logging. Defaults to true. */
  logger?: boolean;
  /** Log level when logging is enabled. Defaults to `info`. */
  logLevel?: string;
}

function required<T>(value: T | undefined, variable: string): T {
  if (value === undefined) {
    throw new SightlineError(
      ErrorCode.INFRA.REQUIRED_ENV_VAR_MISSING,
      `${variable} is required`,
      500,
      { variable },
    );
  }
  return value;
}

export async function createApp(options: CreateAppOptions): Promise<FastifyInstance> {
  const app = Fastify({
    logger: (options.logger ?? true) ? { level: options.logLevel ?? "info" } : false,
    genReqId: () => randomUUID(),
  });

  const db =
    options.db ??
    createDb(required(options.databaseUrl, "DATABASE_URL"), {
      maxConnections: options.databasePoolMax,
    });
  const clickhouse =
    options.clickhouse ??
    createClickHouseClient(required(options.clickhouseUrl, "CLICKHOUSE_URL"), {
      requestTimeoutMs: options.clickhouseRequestTimeoutMs,
    });

  app.decorate("db", db);
  app.decorate("clickhouse", clickhouse);
  app.decorate("eventStore", options.eventStore ?? new ClickHouseEventStore(clickhouse, app.log));
  app.decorate("actionStore", options.actionStore ?? new PgActionStore(db, app.log));
  app.decorate("peopleStore", options.peopleStore ?? new PgPeopleStore(db, app.log));

  app.addHook("onSend", async (request, reply) => {
    reply.header("x-request-id", request.id);
  });

  await app.register(errorHandlerPlugin);
  await app.register(healthPlugin);
  await app.register(trendsPlugin);
  await app.register(peoplePlugin);

  return app;
}
