import type { MathMode } from "@sightline/shared/filters";

export const DEFAULT_MATH: MathMode = "total";

export function resolveMathMode(math: MathMode | undefined): MathMode {
  return math ?? DEFAULT_MATH;
}

/**
 * ClickHouse aggregate for a math mode. Every count the engine produces,
 * daily or per breakdown value, goes through here.
 */
export function countExpression(math: MathMode): string {
  switch (math) {
    case "total":
      return "count()";
    case "dau":
      return "uniqExact(distinct_id)";
    default: {
      const unreachable: never = math;
      throw new Error(`Unhandled math mode: ${String(unreachable)}`);
    }
  }
}
