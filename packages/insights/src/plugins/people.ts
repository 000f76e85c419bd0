import { ErrorCode, SightlineError } from "@sightline/shared/errors";
import { EntityType } from "@sightline/shared/filters";
import type { FastifyPluginAsync } from "fastify";
import fp from "fastify-plugin";
import { resolveDateRange } from "../lib/date-range.js";
import {
  PeopleQuerystring,
  TeamParams,
  parseDisplayMode,
  parseProperties,
  parseStickinessDays,
  parseTeamId,
} from "../lib/params.js";
import { computePeople } from "../lib/people.js";

const peopleRoute: FastifyPluginAsync = async (app) => {
  app.get("/api/teams/:teamId/actions/people", async (request) => {
    const teamId = parseTeamId(TeamParams.parse(request.params).teamId);
    const query = PeopleQuerystring.parse(request.query);

    const type = EntityType.safeParse(query.type);
    if (!type.success) {
      request.log.debug({ type: query.type }, "People requested for unknown entity type");
      return [];
    }

    if (!query.entityId) {
      throw new SightlineError(ErrorCode.QUERY.MISSING_PARAMETER, "entityId is required", 400, {
        parameter: "entityId",
      });
    }

    return computePeople(
      {
        eventStore: app.eventStore,
        actionStore: app.actionStore,
        peopleStore: app.peopleStore,
        logger: request.log,
      },
      {
        teamId,
        entityId: query.entityId,
        type: type.data,
        shownAs: parseDisplayMode(query.shown_as),
        stickinessDays: parseStickinessDays(query.stickiness_days),
        range: resolveDateRange({ dateFrom: query.date_from, dateTo: query.date_to }),
        properties: parseProperties(query.properties),
      },
    );
  });
};

export const peoplePlugin = fp(peopleRoute, { name: "people" });
