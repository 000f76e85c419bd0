/**
 * Collects ClickHouse query parameters for a query assembled from dynamic
 * parts (property filters, action steps). Values never enter the SQL text;
 * each is referenced through a `{name:Type}` placeholder.
 */
export class QueryParams {
  private readonly values: Record<string, unknown> = {};
  private counter = 0;

  /** Bind a named parameter, replacing any earlier value under that name. */
  set(name: string, value: unknown, type: string): string {
    this.values[name] = value;
    return `{${name}:${type}}`;
  }

  /** Bind a value under a generated name and return its placeholder. */
  add(value: unknown, type: string, prefix = "p"): string {
    return this.set(`${prefix}_${this.counter++}`, value, type);
  }

  toRecord(): Record<string, unknown> {
    return { ...this.values };
  }
}

/** AND-combine SQL conditions; an empty list is the identity predicate `1`. */
export function and(conditions: string[]): string {
  if (conditions.length === 0) return "1";
  if (conditions.length === 1) return conditions[0];
  return conditions.map((c) => `(${c})`).join(" AND ");
}

/** OR-combine SQL conditions; an empty list matches nothing. */
export function or(conditions: string[]): string {
  if (conditions.length === 0) return "0";
  if (conditions.length === 1) return conditions[0];
  return conditions.map((c) => `(${c})`).join(" OR ");
}

/** Escape RE2 metacharacters so a literal can be embedded in a pattern. */
export function escapeRegex(literal: string): string {
  return literal.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
