import { ErrorCode, SightlineError, isSightlineError } from "@sightline/shared/errors";
import type { FastifyError, FastifyPluginAsync } from "fastify";
import fp from "fastify-plugin";
import { ZodError } from "zod";

const errorHandler: FastifyPluginAsync = async (app) => {
  app.setErrorHandler<FastifyError>((error, request, reply) => {
    if (isSightlineError(error)) {
      if (error.status >= 500) {
        request.log.error({ err: error }, error.message);
      }
      return reply.status(error.status).send({ error: error.toJSON(request.id) });
    }

    // Schemas parsed outside the query helpers still surface as bad requests.
    if (error instanceof ZodError) {
      const parseError = new SightlineError(ErrorCode.QUERY.PARSE_ERROR, "Invalid request", 400, {
        issues: error.issues.map((i) => ({ path: i.path.join("."), message: i.message })),
      });
      return reply.status(400).send({ error: parseError.toJSON(request.id) });
    }

    // Fastify's own client errors (malformed query strings, bad content types).
    if (error.statusCode !== undefined && error.statusCode >= 400 && error.statusCode < 500) {
      const clientError = new SightlineError(
        ErrorCode.QUERY.PARSE_ERROR,
        error.message,
        error.statusCode,
      );
      return reply.status(error.statusCode).send({ error: clientError.toJSON(request.id) });
    }

    request.log.error(error, "Unhandled error");
    const fallback = new SightlineError(ErrorCode.INFRA.INTERNAL_ERROR, "Internal server error", 500);
    return reply.status(500).send({ error: fallback.toJSON(request.id) });
  });
};

export const errorHandlerPlugin = fp(errorHandler, { name: "error-handler" });
