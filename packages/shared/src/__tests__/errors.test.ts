import { describe, expect, it } from "vitest";
import { ErrorCode } from "../error-codes.js";
import { SightlineError, isSightlineError } from "../errors.js";

describe("SightlineError", () => {
  it("extends Error", () => {
    const err = new SightlineError(ErrorCode.QUERY.PARSE_ERROR, "bad json", 400);
    expect(err).toBeInstanceOf(Error);
    expect(err).toBeInstanceOf(SightlineError);
  });

  it("sets name to SightlineError", () => {
    const err = new SightlineError(ErrorCode.QUERY.PARSE_ERROR, "msg", 400);
    expect(err.name).toBe("SightlineError");
  });

  it("stores code, message, and status", () => {
    const err = new SightlineError(
      ErrorCode.QUERY.MISSING_PARAMETER,
      "stickiness_days is required",
      400,
    );
    expect(err.code).toBe("SIGHTLINE-1001");
    expect(err.message).toBe("stickiness_days is required");
    expect(err.status).toBe(400);
  });

  it("stores optional metadata", () => {
    const meta = { parameter: "events" };
    const err = new SightlineError(ErrorCode.QUERY.PARSE_ERROR, "bad", 400, meta);
    expect(err.metadata).toEqual(meta);
  });

  it("metadata is undefined when not provided", () => {
    const err = new SightlineError(ErrorCode.QUERY.PARSE_ERROR, "msg", 400);
    expect(err.metadata).toBeUndefined();
  });

  describe("toJSON()", () => {
    it("serializes without requestId or metadata", () => {
      const err = new SightlineError(ErrorCode.QUERY.PARSE_ERROR, "bad json", 400);
      expect(err.toJSON()).toEqual({
        code: "SIGHTLINE-1000",
        message: "bad json",
        status: 400,
      });
    });

    it("includes requestId when provided", () => {
      const err = new SightlineError(ErrorCode.QUERY.PARSE_ERROR, "bad json", 400);
      expect(err.toJSON("req-123")).toEqual({
        code: "SIGHTLINE-1000",
        message: "bad json",
        status: 400,
        requestId: "req-123",
      });
    });

    it("includes both requestId and metadata", () => {
      const err = new SightlineError(ErrorCode.INFRA.INTERNAL_ERROR, "boom", 500, {
        detail: "oops",
      });
      expect(err.toJSON("req-456")).toEqual({
        code: "SIGHTLINE-9002",
        message: "boom",
        status: 500,
        requestId: "req-456",
        metadata: { detail: "oops" },
      });
    });
  });
});

describe("isSightlineError()", () => {
  it("returns true for SightlineError instances", () => {
    const err = new SightlineError(ErrorCode.STORE.CLICKHOUSE_UNAVAILABLE, "down", 502);
    expect(isSightlineError(err)).toBe(true);
  });

  it("returns false for plain Error", () => {
    expect(isSightlineError(new Error("nope"))).toBe(false);
  });

  it("returns false for non-error values", () => {
    expect(isSightlineError(null)).toBe(false);
    expect(isSightlineError(undefined)).toBe(false);
    expect(isSightlineError("string")).toBe(false);
    expect(isSightlineError({ code: "SIGHTLINE-1000" })).toBe(false);
  });
});
