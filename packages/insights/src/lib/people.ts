import { ErrorCode, SightlineError } from "@sightline/shared/errors";
import type { DisplayMode, EntityType, PropertyFilter } from "@sightline/shared/filters";
import type { InsightContext } from "./context.js";
import type { DateRange } from "./date-range.js";
import { type EntityDescriptor, actionEntity, entityMatch, eventEntity } from "./entities.js";
import { buildEventFilter } from "./event-filter.js";
import type { PersonProfile } from "./stores/types.js";

/** Most profiles a single people query loads. */
export const PEOPLE_LIMIT = 100;

export interface PeopleQuery {
  teamId: string;
  entityId: string;
  type: EntityType;
  shownAs: DisplayMode;
  /** Required for Stickiness. */
  stickinessDays?: number;
  range: DateRange;
  properties: PropertyFilter[];
}

export interface PeopleResult {
  action: { id: string; name: string };
  people: PersonProfile[];
  count: number;
}

async function resolveEntity(
  ctx: InsightContext,
  query: PeopleQuery,
): Promise<EntityDescriptor | null> {
  if (query.type === "events") return eventEntity({ id: query.entityId });

  const action = await ctx.actionStore.getAction(query.teamId, query.entityId);
  if (!action) {
    ctx.logger?.debug({ actionId: query.entityId }, "People requested for unknown action");
    return null;
  }
  return actionEntity(action, { id: action.id });
}

/**
 * Resolve the people behind an entity's trend: every actor with a matching
 * event (Volume) or every actor active on exactly `stickinessDays` days
 * (Stickiness). Returns an empty list for an unknown action.
 */
export async function computePeople(
  ctx: InsightContext,
  query: PeopleQuery,
): Promise<PeopleResult[]> {
  if (query.shownAs === "Stickiness" && query.stickinessDays === undefined) {
    throw new SightlineError(
      ErrorCode.QUERY.MISSING_PARAMETER,
      "stickiness_days is required when shown_as is Stickiness",
      400,
      { parameter: "stickiness_days" },
    );
  }

  const entity = await resolveEntity(ctx, query);
  if (!entity) return [];

  const match = entityMatch(query.teamId, entity);
  const filter = buildEventFilter(query.range, query.properties);

  const actorIds =
    query.stickinessDays !== undefined && query.shownAs === "Stickiness"
      ? await ctx.eventStore.actorsActiveOnDays(match, filter, query.stickinessDays, PEOPLE_LIMIT)
      : await ctx.eventStore.distinctActors(match, filter, PEOPLE_LIMIT);

  const people = await ctx.peopleStore.getPeople(query.teamId, actorIds.slice(0, PEOPLE_LIMIT));

  return [{ action: { id: entity.id, name: entity.name }, people, count: people.length }];
}
