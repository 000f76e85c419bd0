/**
 * Sightline error catalog.
 *
 * Codes are grouped by the layer that raises them and are stable across
 * releases: clients match on `code`, never on `message`.
 */
export const ErrorCode = {
  /** Request parsing and query construction (1000–1999). */
  QUERY: {
    PARSE_ERROR: "SIGHTLINE-1000",
    MISSING_PARAMETER: "SIGHTLINE-1001",
    INVALID_DATE: "SIGHTLINE-1002",
    INVALID_DATE_RANGE: "SIGHTLINE-1003",
    UNKNOWN_OPERATOR: "SIGHTLINE-1004",
    INVALID_ENTITY: "SIGHTLINE-1005",
  },

  /** Event, action and people stores (2000–2999). */
  STORE: {
    CLICKHOUSE_UNAVAILABLE: "SIGHTLINE-2000",
    ANALYTICS_QUERY_TIMEOUT: "SIGHTLINE-2001",
    POSTGRES_UNAVAILABLE: "SIGHTLINE-2002",
  },

  /** Schema management (5000–5999). */
  DB: {
    CH_MIGRATION_FAILED: "SIGHTLINE-5000",
  },

  /** Process and environment (9000–9999). */
  INFRA: {
    REQUIRED_ENV_VAR_MISSING: "SIGHTLINE-9000",
    INVALID_ENV_VAR: "SIGHTLINE-9001",
    INTERNAL_ERROR: "SIGHTLINE-9002",
  },
} as const;

type ErrorGroups = typeof ErrorCode;

/** Union of every code string in the catalog. */
export type ErrorCodeValue = {
  [G in keyof ErrorGroups]: ErrorGroups[G][keyof ErrorGroups[G]];
}[keyof ErrorGroups];
