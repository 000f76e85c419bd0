import type { ClickHouseClient } from "@clickhouse/client";
import { ErrorCode, SightlineError } from "@sightline/shared/errors";
import type { MathMode } from "@sightline/shared/filters";
import type { FastifyBaseLogger } from "fastify";
import { compileEntityMatch } from "../action-match.js";
import { type EventFilter, compileEventFilter, propertyLabel } from "../event-filter.js";
import { countExpression } from "../math.js";
import { QueryParams } from "../sql.js";
import type {
  ActiveDaysRow,
  DayCountRow,
  EntityMatch,
  EventStore,
  PropertyCountRow,
} from "./types.js";

/** UInt64 columns arrive as JSON strings from JSONEachRow. */
type Numeric = number | string;

/** Event Store backed by the ClickHouse `events` table. */
export class ClickHouseEventStore implements EventStore {
  constructor(
    private readonly client: ClickHouseClient,
    private readonly logger?: FastifyBaseLogger,
  ) {}

  async countByDay(match: EntityMatch, filter: EventFilter, math: MathMode): Promise<DayCountRow[]> {
    const rows = await this.select<{ day: string; count: Numeric }>(
      "countByDay",
      match,
      filter,
      (where) => `
        SELECT
          toString(toDate(timestamp)) AS day,
          ${countExpression(math)} AS count
        FROM events
        WHERE ${where}
        GROUP BY day
        ORDER BY day
      `,
    );
    return rows.map((r) => ({ day: r.day, count: Number(r.count) }));
  }

  async countByProperty(
    match: EntityMatch,
    filter: EventFilter,
    key: string,
    math: MathMode,
  ): Promise<PropertyCountRow[]> {
    const rows = await this.select<{ value: string | null; count: Numeric }>(
      "countByProperty",
      match,
      filter,
      (where, params) => `
        SELECT
          ${propertyLabel(params.set("breakdownKey", key, "String"))} AS value,
          ${countExpression(math)} AS count
        FROM events
        WHERE ${where}
        GROUP BY value
        ORDER BY count DESC
      `,
    );
    return rows.map((r) => ({ value: r.value, count: Number(r.count) }));
  }

  async stickinessHistogram(
    match: EntityMatch,
    filter: EventFilter,
    maxDays: number,
  ): Promise<ActiveDaysRow[]> {
    const rows = await this.select<{ dayCount: Numeric; actors: Numeric }>(
      "stickinessHistogram",
      match,
      filter,
      (where, params) => `
        SELECT
          day_count AS dayCount,
          count() AS actors
        FROM (
          SELECT
            person_id,
            uniqExact(toDate(timestamp)) AS day_count
          FROM events
          WHERE ${where}
          GROUP BY person_id
          HAVING day_count <= ${params.set("maxDays", maxDays, "UInt32")}
        )
        GROUP BY dayCount
        ORDER BY dayCount
      `,
    );
    return rows.map((r) => ({ dayCount: Number(r.dayCount), actors: Number(r.actors) }));
  }

  async firstEventDay(match: EntityMatch, filter: EventFilter): Promise<string | null> {
    const rows = await this.select<{ day: string; matched: Numeric }>(
      "firstEventDay",
      match,
      filter,
      (where) => `
        SELECT
          toString(min(toDate(timestamp))) AS day,
          count() AS matched
        FROM events
        WHERE ${where}
      `,
    );
    const row = rows[0];
    return row && Number(row.matched) > 0 ? row.day : null;
  }

  async distinctActors(match: EntityMatch, filter: EventFilter, limit: number): Promise<string[]> {
    const rows = await this.select<{ personId: string }>(
      "distinctActors",
      match,
      filter,
      (where, params) => `
        SELECT DISTINCT person_id AS personId
        FROM events
        WHERE ${where}
        ORDER BY personId
        LIMIT ${params.set("limit", limit, "UInt32")}
      `,
    );
    return rows.map((r) => r.personId);
  }

  async actorsActiveOnDays(
    match: EntityMatch,
    filter: EventFilter,
    days: number,
    limit: number,
  ): Promise<string[]> {
    const rows = await this.select<{ personId: string }>(
      "actorsActiveOnDays",
      match,
      filter,
      (where, params) => `
        SELECT person_id AS personId
        FROM events
        WHERE ${where}
        GROUP BY person_id
        HAVING uniqExact(toDate(timestamp)) = ${params.set("days", days, "UInt32")}
        ORDER BY personId
        LIMIT ${params.set("limit", limit, "UInt32")}
      `,
    );
    return rows.map((r) => r.personId);
  }

  /**
   * Run a team-scoped query. `build` receives the compiled `WHERE` body
   * (team, entity match, event filter) and the parameter set to extend.
   */
  private async select<T>(
    operation: string,
    match: EntityMatch,
    filter: EventFilter,
    build: (where: string, params: QueryParams) => string,
  ): Promise<T[]> {
    const params = new QueryParams();
    const where = [
      `team_id = ${params.set("teamId", match.teamId, "String")}`,
      `(${compileEntityMatch(match, params)})`,
      `(${compileEventFilter(filter, params)})`,
    ].join(" AND ");
    const query = build(where, params);

    try {
      const result = await this.client.query({
        query,
        query_params: params.toRecord(),
        format: "JSONEachRow",
      });
      return await result.json<T>();
    } catch (err) {
      this.logger?.error({ err, operation }, "ClickHouse query failed");
      const message = err instanceof Error ? err.message : "Unknown ClickHouse error";

      if (/timeout/i.test(message)) {
        throw new SightlineError(
          ErrorCode.STORE.ANALYTICS_QUERY_TIMEOUT,
          "Analytics query timed out. Please try a smaller date range.",
          504,
          { operation },
        );
      }

      throw new SightlineError(
        ErrorCode.STORE.CLICKHOUSE_UNAVAILABLE,
        "Analytics query failed. Please try again later.",
        502,
        { operation },
      );
    }
  }
}
