export { ErrorCode, type ErrorCodeValue } from "./error-codes.js";
import type { ErrorCodeValue } from "./error-codes.js";

/**
 * Error raised by query parsing, the stores and configuration loading. The
 * insights error handler sends it as `{ error: toJSON(requestId) }` with
 * `status` as the HTTP status; the migration runner logs its code and exits.
 *
 * @example
 * import { SightlineError, ErrorCode } from "@sightline/shared/errors";
 * throw new SightlineError(ErrorCode.QUERY.PARSE_ERROR, "Invalid JSON in `events`", 400);
 * throw new SightlineError(ErrorCode.QUERY.MISSING_PARAMETER, "stickiness_days is required", 400, { parameter: "stickiness_days" });
 */
export class SightlineError extends Error {
  constructor(
    public readonly code: ErrorCodeValue,
    message: string,
    public readonly status: number,
    public readonly metadata?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "SightlineError";
  }

  /** Body of the API error envelope; `requestId` is omitted when empty. */
  toJSON(requestId?: string) {
    return {
      code: this.code,
      message: this.message,
      status: this.status,
      ...(requestId ? { requestId } : {}),
      ...(this.metadata ? { metadata: this.metadata } : {}),
    };
  }
}

/** Narrow a caught value to {@link SightlineError}. */
export function isSightlineError(err: unknown): err is SightlineError {
  return err instanceof SightlineError;
}
