import type { MathMode } from "@sightline/shared/filters";
import type { EventFilter } from "./event-filter.js";
import type { EntityMatch, EventStore, PropertyCountRow } from "./stores/types.js";

/** Label for events where the breakdown property is missing or empty. */
export const UNDEFINED_LABEL = "undefined";

export interface BreakdownItem {
  name: string;
  count: number;
}

export interface Breakdown {
  breakdown: BreakdownItem[];
  count: number;
}

/**
 * Label and rank breakdown groups: most frequent first, ties by name. The
 * store returns one row per label, so `dau` counts are never summed here.
 */
export function rankBreakdown(rows: PropertyCountRow[]): Breakdown {
  const breakdown = rows
    .map((row) => ({ name: row.value ?? UNDEFINED_LABEL, count: row.count }))
    .sort((a, b) => b.count - a.count || (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  return { breakdown, count: breakdown.reduce((sum, item) => sum + item.count, 0) };
}

export async function aggregateBreakdown(
  store: EventStore,
  match: EntityMatch,
  filter: EventFilter,
  key: string,
  math: MathMode,
): Promise<Breakdown> {
  const rows = await store.countByProperty(match, filter, key, math);
  return rankBreakdown(rows);
}
