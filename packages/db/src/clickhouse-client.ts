import { createClient } from "@clickhouse/client";
import { ErrorCode, SightlineError } from "@sightline/shared/errors";

export interface ClickHouseClientOptions {
  /** Per-request timeout. ClickHouse's own default applies when omitted. */
  requestTimeoutMs?: number;
}

/**
 * Create a ClickHouse client. Falls back to `CLICKHOUSE_URL` when no url is given.
 */
export function createClickHouseClient(url?: string, options: ClickHouseClientOptions = {}) {
  const resolved = url ?? process.env.CLICKHOUSE_URL;
  if (!resolved) {
    throw new SightlineError(
      ErrorCode.INFRA.REQUIRED_ENV_VAR_MISSING,
      "CLICKHOUSE_URL is not set and no url was provided.",
      500,
      { variable: "CLICKHOUSE_URL" },
    );
  }
  return createClient({
    url: resolved,
    ...(options.requestTimeoutMs !== undefined ? { request_timeout: options.requestTimeoutMs } : {}),
  });
}
