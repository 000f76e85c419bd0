import { describe, expect, it } from "vitest";
import { compileEntityMatch } from "../lib/action-match.js";
import { QueryParams, escapeRegex } from "../lib/sql.js";
import type { ActionStep } from "../lib/stores/types.js";
import { TEAM_ID } from "./helpers/memory-stores.js";

const CURRENT_URL = "JSONExtractString(properties, '$current_url')";

function step(overrides: Partial<ActionStep>): ActionStep {
  return {
    event: null,
    url: null,
    urlMatching: null,
    tagName: null,
    text: null,
    href: null,
    selector: null,
    ...overrides,
  };
}

function compileSteps(steps: ActionStep[]) {
  const params = new QueryParams();
  const sql = compileEntityMatch({ teamId: TEAM_ID, kind: "action", steps }, params);
  return { sql, params: params.toRecord() };
}

describe("compileEntityMatch", () => {
  it("matches a raw event by name", () => {
    const params = new QueryParams();
    const sql = compileEntityMatch({ teamId: TEAM_ID, kind: "event", event: "$pageview" }, params);

    expect(sql).toBe("event = {eventName:String}");
    expect(params.toRecord()).toEqual({ eventName: "$pageview" });
  });

  it("matches nothing for an action without steps", () => {
    expect(compileSteps([]).sql).toBe("0");
  });

  it("ORs steps and ANDs the fields of a step", () => {
    const { sql, params } = compileSteps([
      step({ event: "$pageview", url: "/pricing" }),
      step({ event: "signed_up" }),
    ]);

    expect(sql).toBe(
      `((event = {step_0:String}) AND (position(${CURRENT_URL}, {step_1:String}) > 0)) OR (event = {step_2:String})`,
    );
    expect(params).toEqual({ step_0: "$pageview", step_1: "/pricing", step_2: "signed_up" });
  });

  it("honours the url matching mode", () => {
    expect(compileSteps([step({ url: "https://example.test/", urlMatching: "exact" })]).sql).toBe(
      `${CURRENT_URL} = {step_0:String}`,
    );
    expect(compileSteps([step({ url: "^/docs/.*", urlMatching: "regex" })]).sql).toBe(
      `match(${CURRENT_URL}, {step_0:String})`,
    );
  });

  it("matches element tags and attributes in the chain", () => {
    const tag = compileSteps([step({ tagName: "button" })]);
    expect(tag.sql).toBe("match(elements_chain, {el_0:String})");
    expect(tag.params).toEqual({ el_0: "(^|;)button([.:;]|$)" });

    const text = compileSteps([step({ text: 'Say "hi"' })]);
    expect(text.sql).toBe("position(elements_chain, {el_0:String}) > 0");
    expect(text.params).toEqual({ el_0: 'text="Say \\"hi\\""' });

    const href = compileSteps([step({ href: "/signup" })]);
    expect(href.params).toEqual({ el_0: 'href="/signup"' });
  });

  it("checks the rightmost compound of a selector", () => {
    const { sql, params } = compileSteps([step({ selector: "div > button.primary#buy" })]);

    expect(sql).toBe(
      "(match(elements_chain, {el_0:String})) AND (match(elements_chain, {el_1:String})) AND (position(elements_chain, {el_2:String}) > 0)",
    );
    expect(params).toEqual({
      el_0: "(^|;)button([.:;]|$)",
      el_1: String.raw`(^|;)[^;:]*\.primary([.:;]|$)`,
      el_2: 'attr_id="buy"',
    });
  });

  it("matches every event for a step with no constraints", () => {
    expect(compileSteps([step({})]).sql).toBe("1");
  });
});

describe("escapeRegex", () => {
  it("escapes metacharacters", () => {
    expect(escapeRegex("a.b*c")).toBe("a\\.b\\*c");
    expect(escapeRegex("(x|y)")).toBe("\\(x\\|y\\)");
  });
});
