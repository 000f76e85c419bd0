import { ErrorCode, type ErrorCodeValue, SightlineError } from "@sightline/shared/errors";
import {
  DisplayMode,
  EntityFilterList,
  type EntityFilter,
  type PropertyFilter,
  PropertyFilters,
} from "@sightline/shared/filters";
import { StickinessDays, TeamId } from "@sightline/shared/validation";
import { type ZodError, type ZodIssue, type ZodTypeDef, z } from "zod";

function issuesOf(error: ZodError): ZodIssue[] {
  return error.issues.flatMap((issue) =>
    issue.code === "invalid_union" ? [issue, ...issue.unionErrors.flatMap(issuesOf)] : [issue],
  );
}

/** Zod reports an unrecognised discriminator on the `operator` field. */
function hasUnknownOperator(error: ZodError): boolean {
  return issuesOf(error).some(
    (issue) =>
      issue.code === "invalid_union_discriminator" &&
      issue.path[issue.path.length - 1] === "operator",
  );
}

function toQueryError(parameter: string, error: ZodError, code: ErrorCodeValue): SightlineError {
  if (hasUnknownOperator(error)) {
    return new SightlineError(
      ErrorCode.QUERY.UNKNOWN_OPERATOR,
      `Unknown property operator in \`${parameter}\``,
      400,
      { parameter },
    );
  }
  return new SightlineError(code, `Invalid \`${parameter}\` parameter`, 400, {
    parameter,
    issues: error.issues.map((i) => ({ path: i.path.join("."), message: i.message })),
  });
}

/**
 * Parse a JSON-encoded query parameter and validate it against `schema`.
 * Returns `undefined` when the parameter is absent or empty.
 */
export function parseJsonParam<T>(
  parameter: string,
  raw: string | undefined,
  schema: z.ZodType<T, ZodTypeDef, unknown>,
  code: ErrorCodeValue = ErrorCode.QUERY.PARSE_ERROR,
): T | undefined {
  if (raw === undefined || raw === "") return undefined;

  let decoded: unknown;
  try {
    decoded = JSON.parse(raw);
  } catch {
    throw new SightlineError(
      ErrorCode.QUERY.PARSE_ERROR,
      `Invalid JSON in \`${parameter}\``,
      400,
      { parameter },
    );
  }

  const result = schema.safeParse(decoded);
  if (!result.success) throw toQueryError(parameter, result.error, code);
  return result.data;
}

function parseParam<T>(
  parameter: string,
  raw: unknown,
  schema: z.ZodType<T, ZodTypeDef, unknown>,
): T {
  const result = schema.safeParse(raw);
  if (!result.success) throw toQueryError(parameter, result.error, ErrorCode.QUERY.PARSE_ERROR);
  return result.data;
}

// ---------------------------------------------------------------------------
// Raw request shapes
// ---------------------------------------------------------------------------

/** Repeated query keys collapse to their last value. */
const Single = z.preprocess(
  (v) => (Array.isArray(v) ? v[v.length - 1] : v),
  z.string().optional(),
);

const CommonQuerystring = z.object({
  date_from: Single,
  date_to: Single,
  properties: Single,
  shown_as: Single,
});

export const TrendsQuerystring = CommonQuerystring.extend({
  actions: Single,
  events: Single,
  breakdown: Single,
});
export type TrendsQuerystring = z.infer<typeof TrendsQuerystring>;

export const PeopleQuerystring = CommonQuerystring.extend({
  entityId: Single,
  type: Single,
  stickiness_days: Single,
});
export type PeopleQuerystring = z.infer<typeof PeopleQuerystring>;

export const TeamParams = z.object({ teamId: z.string() });

// ---------------------------------------------------------------------------
// Individual parameters
// ---------------------------------------------------------------------------

export function parseTeamId(raw: unknown): string {
  return parseParam("teamId", raw, TeamId);
}

export function parseDisplayMode(raw: string | undefined): DisplayMode {
  return raw ? parseParam("shown_as", raw, DisplayMode) : "Volume";
}

export function parseProperties(raw: string | undefined): PropertyFilter[] {
  return parseJsonParam("properties", raw, PropertyFilters) ?? [];
}

export function parseEntities(
  parameter: "actions" | "events",
  raw: string | undefined,
): EntityFilter[] | undefined {
  return parseJsonParam(parameter, raw, EntityFilterList, ErrorCode.QUERY.INVALID_ENTITY);
}

export function parseStickinessDays(raw: string | undefined): number | undefined {
  return raw ? parseParam("stickiness_days", raw, StickinessDays) : undefined;
}
