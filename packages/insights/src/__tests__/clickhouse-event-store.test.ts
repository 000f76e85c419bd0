import type { ClickHouseClient } from "@clickhouse/client";
import type { FastifyBaseLogger } from "fastify";
import { describe, expect, it, vi } from "vitest";
import { aggregateBreakdown } from "../lib/breakdown.js";
import { buildEventFilter } from "../lib/event-filter.js";
import { ClickHouseEventStore } from "../lib/stores/clickhouse-event-store.js";
import type { EntityMatch } from "../lib/stores/types.js";
import { TEAM_ID } from "./helpers/memory-stores.js";

const MATCH: EntityMatch = { teamId: TEAM_ID, kind: "event", event: "$pageview" };
const FILTER = buildEventFilter({ dateFrom: "2020-01-01", dateTo: "2020-01-03" });

function mockClickHouse(rows: unknown[] = []) {
  const query = vi.fn().mockResolvedValue({ json: vi.fn().mockResolvedValue(rows) });
  return { client: { query } as unknown as ClickHouseClient, query };
}

function failingClickHouse(error: Error) {
  const query = vi.fn().mockRejectedValue(error);
  return { client: { query } as unknown as ClickHouseClient, query };
}

function lastCall(query: ReturnType<typeof vi.fn>) {
  return query.mock.calls[query.mock.calls.length - 1][0];
}

describe("ClickHouseEventStore", () => {
  it("scopes every query to the team, entity and filter", async () => {
    const { client, query } = mockClickHouse([]);
    await new ClickHouseEventStore(client).countByDay(MATCH, FILTER, "total");

    const call = lastCall(query);
    expect(call.format).toBe("JSONEachRow");
    expect(call.query).toContain(
      "WHERE team_id = {teamId:String} AND (event = {eventName:String}) AND ((timestamp >= {dateFrom:DateTime64(3, 'UTC')}) AND (timestamp <= {dateTo:DateTime64(3, 'UTC')}))",
    );
    expect(call.query_params).toEqual({
      teamId: TEAM_ID,
      eventName: "$pageview",
      dateFrom: "2020-01-01 00:00:00.000",
      dateTo: "2020-01-04 00:00:00.000",
    });
  });

  it("counts per day with the math mode's aggregate", async () => {
    const { client, query } = mockClickHouse([
      { day: "2020-01-01", count: "2" },
      { day: "2020-01-03", count: 1 },
    ]);
    const store = new ClickHouseEventStore(client);

    expect(await store.countByDay(MATCH, FILTER, "total")).toEqual([
      { day: "2020-01-01", count: 2 },
      { day: "2020-01-03", count: 1 },
    ]);
    expect(lastCall(query).query).toContain("count() AS count");

    await store.countByDay(MATCH, FILTER, "dau");
    expect(lastCall(query).query).toContain("uniqExact(distinct_id) AS count");
  });

  it("returns breakdown groups keyed by their decoded label", async () => {
    const { client, query } = mockClickHouse([
      { value: "Chrome", count: "3" },
      { value: null, count: "2" },
      { value: "42", count: "1" },
    ]);
    const rows = await new ClickHouseEventStore(client).countByProperty(
      MATCH,
      FILTER,
      "$browser",
      "total",
    );

    expect(rows).toEqual([
      { value: "Chrome", count: 3 },
      { value: null, count: 2 },
      { value: "42", count: 1 },
    ]);
    const call = lastCall(query);
    expect(call.query_params.breakdownKey).toBe("$browser");
    expect(call.query).toContain(
      "if(JSONType(properties, {breakdownKey:String}) = 'Null', NULL, nullIf(if(JSONType(properties, {breakdownKey:String}) = 'String', JSONExtractString(properties, {breakdownKey:String}), JSONExtractRaw(properties, {breakdownKey:String})), '')) AS value",
    );
    expect(call.query).toContain("GROUP BY value");
  });

  it("counts an actor once under dau when a value is stored as both string and number", async () => {
    // `"3"` and `3` decode to the same label, so ClickHouse returns a single group.
    const { client, query } = mockClickHouse([{ value: "3", count: "1" }]);
    const store = new ClickHouseEventStore(client);

    const result = await aggregateBreakdown(store, MATCH, FILTER, "plan", "dau");

    expect(result).toEqual({ breakdown: [{ name: "3", count: 1 }], count: 1 });
    expect(lastCall(query).query).toContain("uniqExact(distinct_id) AS count");
  });

  it("builds the stickiness histogram in one query", async () => {
    const { client, query } = mockClickHouse([
      { dayCount: "1", actors: "4" },
      { dayCount: "2", actors: "1" },
    ]);
    const rows = await new ClickHouseEventStore(client).stickinessHistogram(MATCH, FILTER, 4);

    expect(rows).toEqual([
      { dayCount: 1, actors: 4 },
      { dayCount: 2, actors: 1 },
    ]);
    const call = lastCall(query);
    expect(call.query).toContain("HAVING day_count <= {maxDays:UInt32}");
    expect(call.query).toContain("GROUP BY dayCount");
    expect(call.query_params.maxDays).toBe(4);
  });

  it("returns the first event day only when something matched", async () => {
    const found = mockClickHouse([{ day: "2020-01-02", matched: "3" }]);
    expect(await new ClickHouseEventStore(found.client).firstEventDay(MATCH, FILTER)).toBe(
      "2020-01-02",
    );

    const empty = mockClickHouse([{ day: "1970-01-01", matched: "0" }]);
    expect(await new ClickHouseEventStore(empty.client).firstEventDay(MATCH, FILTER)).toBeNull();
  });

  it("lists actors up to a limit", async () => {
    const { client, query } = mockClickHouse([{ personId: "p1" }, { personId: "p2" }]);
    const store = new ClickHouseEventStore(client);

    expect(await store.distinctActors(MATCH, FILTER, 100)).toEqual(["p1", "p2"]);
    expect(lastCall(query).query_params.limit).toBe(100);

    await store.actorsActiveOnDays(MATCH, FILTER, 2, 100);
    const call = lastCall(query);
    expect(call.query).toContain("HAVING uniqExact(toDate(timestamp)) = {days:UInt32}");
    expect(call.query_params).toMatchObject({ days: 2, limit: 100 });
  });

  it("maps timeouts to ANALYTICS_QUERY_TIMEOUT", async () => {
    const { client } = failingClickHouse(new Error("Timeout error."));

    await expect(
      new ClickHouseEventStore(client).countByDay(MATCH, FILTER, "total"),
    ).rejects.toMatchObject({
      code: "SIGHTLINE-2001",
      status: 504,
      metadata: { operation: "countByDay" },
    });
  });

  it("maps other failures to CLICKHOUSE_UNAVAILABLE and logs them", async () => {
    const error = new Error("connect ECONNREFUSED");
    const { client } = failingClickHouse(error);
    const logger = { error: vi.fn() } as unknown as FastifyBaseLogger;

    await expect(
      new ClickHouseEventStore(client, logger).distinctActors(MATCH, FILTER, 100),
    ).rejects.toMatchObject({
      code: "SIGHTLINE-2000",
      status: 502,
      metadata: { operation: "distinctActors" },
    });
    expect(logger.error).toHaveBeenCalledWith(
      { err: error, operation: "distinctActors" },
      "ClickHouse query failed",
    );
  });
});
