import type { MathMode } from "@sightline/shared/filters";
import { format, parseISO } from "date-fns";
import type { DateRange } from "./date-range.js";
import { eachDay } from "./date-range.js";
import type { EventFilter } from "./event-filter.js";
import type { DayCountRow, EntityMatch, EventStore } from "./stores/types.js";

/** `Wed. 1 January` */
export const DAY_LABEL_FORMAT = "EEE. d MMMM";

export interface DailySeries {
  labels: string[];
  days: string[];
  data: number[];
  count: number;
}

/**
 * Spread per-day counts over every day of the window, zero-filling the gaps.
 * An unbounded window starts at the earliest row. Rows outside the window
 * are dropped. Returns `null` when there are no rows at all.
 */
export function fillDailySeries(rows: DayCountRow[], range: DateRange): DailySeries | null {
  if (rows.length === 0) return null;

  const counts = new Map<string, number>();
  for (const row of rows) {
    counts.set(row.day, (counts.get(row.day) ?? 0) + row.count);
  }

  const firstDay = rows.reduce((min, r) => (r.day < min ? r.day : min), rows[0].day);
  const dateFrom = range.dateFrom ?? firstDay;
  const days = dateFrom <= range.dateTo ? eachDay(dateFrom, range.dateTo) : [];
  const data = days.map((day) => counts.get(day) ?? 0);

  return {
    labels: days.map((day) => format(parseISO(day), DAY_LABEL_FORMAT)),
    days,
    data,
    count: data.reduce((sum, n) => sum + n, 0),
  };
}

export async function aggregateByDay(
  store: EventStore,
  match: EntityMatch,
  filter: EventFilter,
  math: MathMode,
): Promise<DailySeries | null> {
  const rows = await store.countByDay(match, filter, math);
  return fillDailySeries(rows, filter);
}
