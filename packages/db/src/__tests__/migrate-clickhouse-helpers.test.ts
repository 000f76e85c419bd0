import { describe, expect, it } from "vitest";
import { parseMigrationFilename, splitStatements } from "../migrate-clickhouse-helpers.js";

describe("parseMigrationFilename", () => {
  it("splits version and name", () => {
    expect(parseMigrationFilename("0002_events_table.sql")).toEqual({
      version: "0002",
      name: "events_table",
    });
  });

  it.each(["no_version.sql", "2_events.sql", "0002_events.txt", "0002-events.sql"])(
    "rejects %s",
    (filename) => {
      expect(() => parseMigrationFilename(filename)).toThrow(
        expect.objectContaining({ code: "SIGHTLINE-5000", metadata: { filename } }),
      );
    },
  );
});

describe("splitStatements", () => {
  it("splits on semicolons and trims", () => {
    expect(splitStatements("CREATE TABLE a (x String);\n  CREATE TABLE b (y String);\n")).toEqual([
      "CREATE TABLE a (x String)",
      "CREATE TABLE b (y String)",
    ]);
  });

  it("drops full-line and trailing comments", () => {
    expect(splitStatements("-- header\nSELECT 1; -- one\n-- between\nSELECT 2")).toEqual([
      "SELECT 1",
      "SELECT 2",
    ]);
  });

  it("keeps semicolons and dashes inside literals", () => {
    expect(splitStatements("SELECT 'a;b--c' AS `x;y`;SELECT 'it\\'s'")).toEqual([
      "SELECT 'a;b--c' AS `x;y`",
      "SELECT 'it\\'s'",
    ]);
  });

  it("returns nothing for empty or comment-only input", () => {
    expect(splitStatements("")).toEqual([]);
    expect(splitStatements("-- only a comment\n;;")).toEqual([]);
  });

  it("splits the bundled events migration", () => {
    const sql = [
      "-- Raw events.",
      "CREATE TABLE IF NOT EXISTS events (",
      "    properties String DEFAULT '{}'",
      ")",
      "ENGINE = MergeTree()",
      "ORDER BY (team_id, toDate(timestamp), event, uuid);",
    ].join("\n");

    expect(splitStatements(sql)).toEqual([
      "CREATE TABLE IF NOT EXISTS events (\n    properties String DEFAULT '{}'\n)\nENGINE = MergeTree()\nORDER BY (team_id, toDate(timestamp), event, uuid)",
    ]);
  });
});
