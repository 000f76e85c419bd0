import type { FastifyPluginAsync } from "fastify";
import fp from "fastify-plugin";
import { resolveDateRange } from "../lib/date-range.js";
import {
  TeamParams,
  TrendsQuerystring,
  parseDisplayMode,
  parseEntities,
  parseProperties,
  parseTeamId,
} from "../lib/params.js";
import { computeTrends } from "../lib/trends.js";

const trendsRoute: FastifyPluginAsync = async (app) => {
  app.get("/api/teams/:teamId/actions/trends", async (request) => {
    const teamId = parseTeamId(TeamParams.parse(request.params).teamId);
    const query = TrendsQuerystring.parse(request.query);

    return computeTrends(
      {
        eventStore: app.eventStore,
        actionStore: app.actionStore,
        peopleStore: app.peopleStore,
        logger: request.log,
      },
      {
        teamId,
        actions: parseEntities("actions", query.actions),
        events: parseEntities("events", query.events),
        range: resolveDateRange({ dateFrom: query.date_from, dateTo: query.date_to }),
        properties: parseProperties(query.properties),
        breakdown: query.breakdown || undefined,
        shownAs: parseDisplayMode(query.shown_as),
      },
    );
  });
};

export const trendsPlugin = fp(trendsRoute, { name: "trends" });
