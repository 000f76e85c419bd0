import { z } from "zod";

// ---------------------------------------------------------------------------
// Modes
// ---------------------------------------------------------------------------

/** How an entity's matching events are presented. */
export const DisplayMode = z.enum(["Volume", "Stickiness"]);
export type DisplayMode = z.infer<typeof DisplayMode>;

/**
 * What a count counts: every matching event (`total`) or distinct actors
 * per grouping key (`dau`).
 */
export const MathMode = z.enum(["total", "dau"]);
export type MathMode = z.infer<typeof MathMode>;

/** The two kinds of entity a trends or people query can target. */
export const EntityType = z.enum(["actions", "events"]);
export type EntityType = z.infer<typeof EntityType>;

// ---------------------------------------------------------------------------
// Property filters
// ---------------------------------------------------------------------------

export const PropertyOperator = z.enum([
  "exact",
  "is_not",
  "icontains",
  "not_icontains",
  "regex",
  "gt",
  "lt",
  "is_set",
  "is_not_set",
]);
export type PropertyOperator = z.infer<typeof PropertyOperator>;

export const PropertyScalar = z.union([z.string(), z.number(), z.boolean()]);
export type PropertyScalar = z.infer<typeof PropertyScalar>;

const PropertyKey = z.string().min(1);

const EqualityFilter = z.object({
  key: PropertyKey,
  operator: z.enum(["exact", "is_not"]),
  value: z.union([PropertyScalar, z.array(PropertyScalar).min(1)]),
});

const TextFilter = z.object({
  key: PropertyKey,
  operator: z.enum(["icontains", "not_icontains", "regex"]),
  value: z.union([z.string(), z.number()]).transform(String),
});

const NumericFilter = z.object({
  key: PropertyKey,
  operator: z.enum(["gt", "lt"]),
  value: z.coerce.number(),
});

const PresenceFilter = z.object({
  key: PropertyKey,
  operator: z.enum(["is_set", "is_not_set"]),
});

/**
 * A single predicate over an event property. `operator` defaults to `exact`;
 * an array `value` on `exact`/`is_not` means any-of/none-of.
 */
export const PropertyFilter = z.preprocess(
  (raw) =>
    typeof raw === "object" && raw !== null && !("operator" in raw)
      ? { ...raw, operator: "exact" }
      : raw,
  z.discriminatedUnion("operator", [EqualityFilter, TextFilter, NumericFilter, PresenceFilter]),
);
export type PropertyFilter = z.infer<typeof PropertyFilter>;

/**
 * Split a legacy object-form key (`"$current_url__icontains"`) into its
 * property key and operator. Keys without a suffix use `exact`.
 */
export function splitLegacyKey(raw: string): { key: string; operator: string } {
  const idx = raw.lastIndexOf("__");
  if (idx <= 0) return { key: raw, operator: "exact" };
  return { key: raw.slice(0, idx), operator: raw.slice(idx + 2) };
}

const LegacyPropertyFilters = z.record(z.unknown()).transform((obj, ctx) => {
  const out: PropertyFilter[] = [];
  for (const [rawKey, value] of Object.entries(obj)) {
    const { key, operator } = splitLegacyKey(rawKey);
    const candidate =
      operator === "is_set" || operator === "is_not_set"
        ? { key, operator }
        : { key, operator, value };
    const parsed = PropertyFilter.safeParse(candidate);
    if (!parsed.success) {
      for (const issue of parsed.error.issues) {
        ctx.addIssue({ ...issue, path: [rawKey, ...issue.path] });
      }
      return z.NEVER;
    }
    out.push(parsed.data);
  }
  return out;
});

/** Property filters in list form, or the legacy `{ "key__op": value }` object form. */
export const PropertyFilters = z.union([z.array(PropertyFilter), LegacyPropertyFilters]);

// ---------------------------------------------------------------------------
// Entities
// ---------------------------------------------------------------------------

/**
 * One requested entity with its optional overrides. For events `id` is the
 * event name; for actions it is the action id.
 */
export const EntityFilter = z.object({
  id: z.union([z.string().min(1), z.number().int()]).transform(String),
  name: z.string().optional(),
  math: MathMode.optional(),
  properties: PropertyFilters.optional(),
  breakdown: z.string().min(1).optional(),
});
export type EntityFilter = z.infer<typeof EntityFilter>;

export const EntityFilterList = z.array(EntityFilter);
