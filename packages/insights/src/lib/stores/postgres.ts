import { ErrorCode, SightlineError } from "@sightline/shared/errors";
import type { FastifyBaseLogger } from "fastify";

/**
 * Run a PostgreSQL read, mapping driver failures to a catalog error.
 * Errors that are already SightlineErrors pass through.
 */
export async function withPostgres<T>(
  operation: string,
  logger: FastifyBaseLogger | undefined,
  fn: () => Promise<T>,
): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    if (err instanceof SightlineError) throw err;
    logger?.error({ err, operation }, "PostgreSQL query failed");
    throw new SightlineError(
      ErrorCode.STORE.POSTGRES_UNAVAILABLE,
      "Database query failed. Please try again later.",
      502,
      { operation },
    );
  }
}
