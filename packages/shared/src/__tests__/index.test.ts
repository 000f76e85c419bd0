import { describe, expect, it } from "vitest";
import { SightlineError, isSightlineError } from "../index.js";
import { DisplayMode, EntityFilter, MathMode, PropertyFilters } from "../index.js";
import { ActionId, TeamId, Uuid } from "../index.js";

describe("barrel exports", () => {
  it("re-exports errors module", () => {
    expect(SightlineError).toBeDefined();
    expect(isSightlineError).toBeDefined();
  });

  it("re-exports filters module", () => {
    expect(DisplayMode).toBeDefined();
    expect(MathMode).toBeDefined();
    expect(EntityFilter).toBeDefined();
    expect(PropertyFilters).toBeDefined();
  });

  it("re-exports validation module", () => {
    expect(Uuid).toBeDefined();
    expect(TeamId).toBeDefined();
    expect(ActionId).toBeDefined();
  });
});
