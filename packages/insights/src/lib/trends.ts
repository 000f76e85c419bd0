import type { DisplayMode, EntityFilter, PropertyFilter } from "@sightline/shared/filters";
import { type BreakdownItem, aggregateBreakdown } from "./breakdown.js";
import type { InsightContext } from "./context.js";
import { aggregateByDay } from "./daily.js";
import type { DateRange } from "./date-range.js";
import {
  type EntityDescriptor,
  type EntityEcho,
  actionEntity,
  echoEntity,
  entityMatch,
  eventEntity,
} from "./entities.js";
import { buildEventFilter, withProperties } from "./event-filter.js";
import { resolveMathMode } from "./math.js";
import { aggregateStickiness } from "./stickiness.js";

export interface TrendsQuery {
  teamId: string;
  /** `undefined` when the request names no actions. */
  actions?: EntityFilter[];
  /** `undefined` when the request names no events. */
  events?: EntityFilter[];
  range: DateRange;
  properties: PropertyFilter[];
  breakdown?: string;
  shownAs: DisplayMode;
}

export interface TrendResult {
  action: EntityEcho;
  label: string;
  count: number;
  breakdown: BreakdownItem[];
  labels?: string[];
  /** ISO days for Volume, active-day buckets for Stickiness. */
  days?: string[] | number[];
  data?: number[];
}

async function computeEntity(
  ctx: InsightContext,
  query: TrendsQuery,
  entity: EntityDescriptor,
): Promise<TrendResult> {
  const result: TrendResult = {
    action: echoEntity(entity),
    label: entity.name,
    count: 0,
    breakdown: [],
  };

  const match = entityMatch(query.teamId, entity);
  const filter = withProperties(
    buildEventFilter(query.range, query.properties),
    entity.filters.properties,
  );

  switch (query.shownAs) {
    case "Volume": {
      const math = resolveMathMode(entity.filters.math);
      const series = await aggregateByDay(ctx.eventStore, match, filter, math);
      if (series) Object.assign(result, series);

      const breakdownKey = entity.filters.breakdown ?? query.breakdown;
      if (breakdownKey) {
        const { breakdown, count } = await aggregateBreakdown(
          ctx.eventStore,
          match,
          filter,
          breakdownKey,
          math,
        );
        result.breakdown = breakdown;
        result.count = count;
      }
      return result;
    }
    case "Stickiness":
      return Object.assign(result, await aggregateStickiness(ctx.eventStore, match, filter));
  }
}

/**
 * Compute one result per requested entity: events first, in request order,
 * then actions. Event entities that produced no series are left out; action
 * entities are always kept, unknown action ids skipped. Without any requested
 * entity, every action of the team is computed.
 */
export async function computeTrends(
  ctx: InsightContext,
  query: TrendsQuery,
): Promise<TrendResult[]> {
  const results: TrendResult[] = [];

  for (const filters of query.events ?? []) {
    const result = await computeEntity(ctx, query, eventEntity(filters));
    if (result.labels !== undefined) results.push(result);
  }

  if (query.actions && query.actions.length > 0) {
    for (const filters of query.actions) {
      const action = await ctx.actionStore.getAction(query.teamId, filters.id);
      if (!action) {
        ctx.logger?.debug({ actionId: filters.id }, "Skipping unknown action");
        continue;
      }
      results.push(await computeEntity(ctx, query, actionEntity(action, filters)));
    }
  } else if (query.events === undefined) {
    for (const action of await ctx.actionStore.listActions(query.teamId)) {
      results.push(await computeEntity(ctx, query, actionEntity(action, { id: action.id })));
    }
  }

  return results;
}
