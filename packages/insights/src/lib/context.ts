import type { FastifyBaseLogger } from "fastify";
import type { ActionStore, EventStore, PeopleStore } from "./stores/types.js";

/** Collaborators every insight computation reads from. */
export interface InsightContext {
  eventStore: EventStore;
  actionStore: ActionStore;
  peopleStore: PeopleStore;
  logger?: FastifyBaseLogger;
}
