import { sql } from "drizzle-orm";
import type { FastifyPluginAsync } from "fastify";
import fp from "fastify-plugin";

interface HealthResponse {
  status: "ok" | "degraded";
  postgres: "up" | "down";
  clickhouse: "up" | "down";
}

const healthRoute: FastifyPluginAsync = async (app) => {
  app.get("/health", async (_request, reply) => {
    const [pg, ch] = await Promise.allSettled([
      app.db.execute(sql`SELECT 1`),
      app.clickhouse.ping(),
    ]);

    const pgUp = pg.status === "fulfilled";
    const chUp = ch.status === "fulfilled" && ch.value.success;

    const response: HealthResponse = {
      status: pgUp && chUp ? "ok" : "degraded",
      postgres: pgUp ? "up" : "down",
      clickhouse: chUp ? "up" : "down",
    };

    return reply.status(response.status === "ok" ? 200 : 503).send(response);
  });
};

export const healthPlugin = fp(healthRoute, { name: "health" });
