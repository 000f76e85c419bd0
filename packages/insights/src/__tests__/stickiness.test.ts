import { describe, expect, it } from "vitest";
import { buildEventFilter } from "../lib/event-filter.js";
import {
  aggregateStickiness,
  buildStickiness,
  stickinessLabel,
  stickinessRangeDays,
} from "../lib/stickiness.js";
import type { EntityMatch } from "../lib/stores/types.js";
import { MemoryEventStore, TEAM_ID } from "./helpers/memory-stores.js";

const OPENED: EntityMatch = { teamId: TEAM_ID, kind: "event", event: "app_opened" };

describe("stickiness helpers", () => {
  it("counts range days up to the midnight after the window, plus two", () => {
    expect(stickinessRangeDays("2020-01-01", "2020-01-02")).toBe(4);
    expect(stickinessRangeDays("2020-01-05", "2020-01-05")).toBe(3);
  });

  it("pluralises labels", () => {
    expect(stickinessLabel(1)).toBe("1 day");
    expect(stickinessLabel(2)).toBe("2 days");
  });

  it("zero-fills buckets 1 to rangeDays - 1", () => {
    expect(buildStickiness([{ dayCount: 2, actors: 5 }], 4)).toEqual({
      labels: ["1 day", "2 days", "3 days"],
      days: [1, 2, 3],
      data: [0, 5, 0],
    });
  });
});

describe("aggregateStickiness", () => {
  it("builds the histogram of active days per actor", async () => {
    const store = new MemoryEventStore([
      { event: "app_opened", timestamp: "2020-01-01T08:00:00.000Z", personId: "a" },
      { event: "app_opened", timestamp: "2020-01-01T18:00:00.000Z", personId: "a" },
      { event: "app_opened", timestamp: "2020-01-02T08:00:00.000Z", personId: "a" },
      { event: "app_opened", timestamp: "2020-01-01T09:00:00.000Z", personId: "b" },
    ]);
    const filter = buildEventFilter({ dateFrom: "2020-01-01", dateTo: "2020-01-02" });

    expect(await aggregateStickiness(store, OPENED, filter)).toEqual({
      labels: ["1 day", "2 days", "3 days"],
      days: [1, 2, 3],
      data: [1, 1, 0],
    });
  });

  it("counts each actor in exactly one bucket", async () => {
    const store = new MemoryEventStore(
      ["a", "b", "c", "d", "e"].flatMap((personId, i) =>
        Array.from({ length: (i % 3) + 1 }, (_, d) => ({
          event: "app_opened",
          timestamp: `2020-01-0${d + 1}T12:00:00.000Z`,
          personId,
        })),
      ),
    );
    const filter = buildEventFilter({ dateFrom: "2020-01-01", dateTo: "2020-01-07" });
    const series = await aggregateStickiness(store, OPENED, filter);

    expect(series.data.reduce((a, b) => a + b, 0)).toBe(5);
    expect(series.data.slice(0, 3)).toEqual([2, 2, 1]);
  });

  it("starts an unbounded window at the first matching event", async () => {
    const store = new MemoryEventStore([
      { event: "app_opened", timestamp: "2020-01-03T08:00:00.000Z", personId: "a" },
    ]);
    const filter = buildEventFilter({ dateFrom: null, dateTo: "2020-01-05" });
    const series = await aggregateStickiness(store, OPENED, filter);

    expect(series.days).toEqual([1, 2, 3, 4]);
    expect(series.data).toEqual([1, 0, 0, 0]);
  });

  it("falls back to the last day when an unbounded window matches nothing", async () => {
    const filter = buildEventFilter({ dateFrom: null, dateTo: "2020-01-05" });
    const series = await aggregateStickiness(new MemoryEventStore(), OPENED, filter);

    expect(series).toEqual({ labels: ["1 day", "2 days"], days: [1, 2], data: [0, 0] });
  });
});
