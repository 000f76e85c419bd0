import type { ClickHouseClient } from "@clickhouse/client";
import type { Database } from "@sightline/db/client";
import type { ActionStore, EventStore, PeopleStore } from "./lib/stores/types.js";

declare module "fastify" {
  interface FastifyInstance {
    db: Database;
    clickhouse: ClickHouseClient;
    eventStore: EventStore;
    actionStore: ActionStore;
    peopleStore: PeopleStore;
  }
}
