import { daysBetween, shiftDay } from "./date-range.js";
import { type EventFilter, withDateFrom } from "./event-filter.js";
import type { ActiveDaysRow, EntityMatch, EventStore } from "./stores/types.js";

export interface StickinessSeries {
  labels: string[];
  days: number[];
  data: number[];
}

/**
 * Upper bound on distinct active days per actor, counted from `dateFrom` to
 * the filter's upper bound (midnight after `dateTo`) plus two. Buckets run
 * from 1 to `rangeDays - 1`, so a two-day window yields three buckets.
 */
export function stickinessRangeDays(dateFrom: string, dateTo: string): number {
  return daysBetween(dateFrom, shiftDay(dateTo, 1)) + 2;
}

export function stickinessLabel(days: number): string {
  return `${days} day${days > 1 ? "s" : ""}`;
}

/** Zero-filled histogram over buckets `1 .. rangeDays - 1`. */
export function buildStickiness(rows: ActiveDaysRow[], rangeDays: number): StickinessSeries {
  const actorsByDays = new Map<number, number>();
  for (const row of rows) {
    actorsByDays.set(row.dayCount, (actorsByDays.get(row.dayCount) ?? 0) + row.actors);
  }

  const labels: string[] = [];
  const days: number[] = [];
  const data: number[] = [];
  for (let day = 1; day < rangeDays; day++) {
    labels.push(stickinessLabel(day));
    days.push(day);
    data.push(actorsByDays.get(day) ?? 0);
  }
  return { labels, days, data };
}

/**
 * Per actor, count distinct active days in the window; then count actors per
 * day count. An unbounded window starts at the first matching event.
 */
export async function aggregateStickiness(
  store: EventStore,
  match: EntityMatch,
  filter: EventFilter,
): Promise<StickinessSeries> {
  let dateFrom = filter.dateFrom ?? (await store.firstEventDay(match, filter)) ?? filter.dateTo;
  if (dateFrom > filter.dateTo) dateFrom = filter.dateTo;

  const rangeDays = stickinessRangeDays(dateFrom, filter.dateTo);
  const rows = await store.stickinessHistogram(match, withDateFrom(filter, dateFrom), rangeDays);
  return buildStickiness(rows, rangeDays);
}
