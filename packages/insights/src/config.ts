import { ErrorCode, SightlineError } from "@sightline/shared/errors";

export interface AppConfig {
  port: number;
  databaseUrl: string;
  databasePoolMax: number;
  clickhouseUrl: string;
  clickhouseRequestTimeoutMs: number;
  logLevel: string;
}

function readPositiveInt(variable: string, fallback: number): number {
  const raw = process.env[variable];
  if (raw === undefined || raw === "") return fallback;

  const value = Number.parseInt(raw, 10);
  if (!Number.isInteger(value) || value <= 0 || String(value) !== raw.trim()) {
    throw new SightlineError(
      ErrorCode.INFRA.INVALID_ENV_VAR,
      `${variable} must be a positive integer`,
      500,
      { variable, value: raw },
    );
  }
  return value;
}

export function loadConfig(): AppConfig {
  const port = readPositiveInt("PORT", 3002);
  const databasePoolMax = readPositiveInt("DATABASE_POOL_MAX", 10);
  const clickhouseRequestTimeoutMs = readPositiveInt("CLICKHOUSE_REQUEST_TIMEOUT_MS", 30_000);
  const databaseUrl = process.env.DATABASE_URL;
  const clickhouseUrl = process.env.CLICKHOUSE_URL;
  const logLevel = process.env.LOG_LEVEL || "info";

  if (!databaseUrl) {
    throw new SightlineError(
      ErrorCode.INFRA.REQUIRED_ENV_VAR_MISSING,
      "DATABASE_URL is required",
      500,
      { variable: "DATABASE_URL" },
    );
  }

  if (!clickhouseUrl) {
    throw new SightlineError(
      ErrorCode.INFRA.REQUIRED_ENV_VAR_MISSING,
      "CLICKHOUSE_URL is required",
      500,
      { variable: "CLICKHOUSE_URL" },
    );
  }

  return {
    port,
    databaseUrl,
    databasePoolMax,
    clickhouseUrl,
    clickhouseRequestTimeoutMs,
    logLevel,
  };
}
