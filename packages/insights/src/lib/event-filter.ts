import type { PropertyFilter } from "@sightline/shared/filters";
import type { DateRange } from "./date-range.js";
import { shiftDay } from "./date-range.js";
import { type QueryParams, and, or } from "./sql.js";

/**
 * The per-request predicate applied to every store query: a day window plus
 * AND-combined property filters.
 */
export interface EventFilter {
  dateFrom: string | null;
  dateTo: string;
  properties: PropertyFilter[];
}

export function buildEventFilter(range: DateRange, properties: PropertyFilter[] = []): EventFilter {
  return { dateFrom: range.dateFrom, dateTo: range.dateTo, properties };
}

/** Same filter with extra property filters AND-combined. */
export function withProperties(filter: EventFilter, extra: PropertyFilter[] = []): EventFilter {
  if (extra.length === 0) return filter;
  return { ...filter, properties: [...filter.properties, ...extra] };
}

/** Same filter with its lower bound replaced. */
export function withDateFrom(filter: EventFilter, dateFrom: string): EventFilter {
  return { ...filter, dateFrom };
}

const startOfDay = (day: string) => `${day} 00:00:00.000`;

/** Bound type matching the `timestamp` column, so day edges stay in UTC. */
const TIMESTAMP_TYPE = "DateTime64(3, 'UTC')";

/**
 * A property's value as text: strings unquoted, every other JSON value in its
 * raw JSON form (`3`, `true`). Missing properties yield `''`.
 */
function propertyText(key: string): string {
  return `if(JSONType(properties, ${key}) = 'String', JSONExtractString(properties, ${key}), JSONExtractRaw(properties, ${key}))`;
}

function compileProperty(filter: PropertyFilter, params: QueryParams): string {
  const key = params.add(filter.key, "String", "prop");

  switch (filter.operator) {
    case "exact":
    case "is_not": {
      const values = Array.isArray(filter.value) ? filter.value : [filter.value];
      const anyOf = or(
        values.map((v) => `${propertyText(key)} = ${params.add(String(v), "String", "val")}`),
      );
      return filter.operator === "exact" ? anyOf : `NOT (${anyOf})`;
    }
    case "icontains":
      return `positionCaseInsensitiveUTF8(${propertyText(key)}, ${params.add(filter.value, "String", "val")}) > 0`;
    case "not_icontains":
      return `positionCaseInsensitiveUTF8(${propertyText(key)}, ${params.add(filter.value, "String", "val")}) = 0`;
    case "regex":
      return `match(${propertyText(key)}, ${params.add(filter.value, "String", "val")})`;
    case "gt":
      return `JSONHas(properties, ${key}) AND JSONExtractFloat(properties, ${key}) > ${params.add(filter.value, "Float64", "val")}`;
    case "lt":
      return `JSONHas(properties, ${key}) AND JSONExtractFloat(properties, ${key}) < ${params.add(filter.value, "Float64", "val")}`;
    case "is_set":
      return `JSONHas(properties, ${key})`;
    case "is_not_set":
      return `NOT JSONHas(properties, ${key})`;
  }
}

/**
 * A property's value as a grouping label: the text of {@link propertyText},
 * or `NULL` when the property is missing, JSON `null` or `""`.
 */
export function propertyLabel(key: string): string {
  return `if(JSONType(properties, ${key}) = 'Null', NULL, nullIf(${propertyText(key)}, ''))`;
}

/**
 * Compile the filter into a ClickHouse `WHERE` fragment.
 *
 * The upper bound is `<=` midnight after `dateTo`, so the whole of the last
 * day is included. A filter with neither a lower bound nor property filters
 * still carries its upper bound.
 */
export function compileEventFilter(filter: EventFilter, params: QueryParams): string {
  const conditions: string[] = [];
  if (filter.dateFrom !== null) {
    const dateFrom = params.set("dateFrom", startOfDay(filter.dateFrom), TIMESTAMP_TYPE);
    conditions.push(`timestamp >= ${dateFrom}`);
  }
  const dateTo = params.set("dateTo", startOfDay(shiftDay(filter.dateTo, 1)), TIMESTAMP_TYPE);
  conditions.push(`timestamp <= ${dateTo}`);
  for (const property of filter.properties) {
    conditions.push(compileProperty(property, params));
  }
  return and(conditions);
}
