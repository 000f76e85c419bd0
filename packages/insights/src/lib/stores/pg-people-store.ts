import type { Database } from "@sightline/db/client";
import { personDistinctIds, persons } from "@sightline/db/schema";
import { Uuid } from "@sightline/shared/validation";
import { and, asc, eq, inArray } from "drizzle-orm";
import type { FastifyBaseLogger } from "fastify";
import { withPostgres } from "./postgres.js";
import type { PeopleStore, PersonProfile } from "./types.js";

/** Display name: the `email` property, else the newest distinct id, else the id. */
export function personName(
  id: string,
  properties: Record<string, unknown>,
  distinctIds: string[],
): string {
  const email = properties.email;
  if (typeof email === "string" && email.length > 0) return email;
  return distinctIds[distinctIds.length - 1] ?? id;
}

/** People Store over the `persons` and `person_distinct_ids` tables. */
export class PgPeopleStore implements PeopleStore {
  constructor(
    private readonly db: Database,
    private readonly logger?: FastifyBaseLogger,
  ) {}

  async getPeople(teamId: string, personIds: string[]): Promise<PersonProfile[]> {
    // Actor ids come from event rows; only UUIDs can name a person.
    const ids = personIds.filter((id) => Uuid.safeParse(id).success);
    if (ids.length === 0) return [];

    return withPostgres("getPeople", this.logger, async () => {
      const rows = await this.db
        .select()
        .from(persons)
        .where(and(eq(persons.teamId, teamId), inArray(persons.id, ids)))
        .orderBy(asc(persons.id));

      if (rows.length === 0) return [];

      const distinctRows = await this.db
        .select({ personId: personDistinctIds.personId, distinctId: personDistinctIds.distinctId })
        .from(personDistinctIds)
        .where(
          and(
            eq(personDistinctIds.teamId, teamId),
            inArray(
              personDistinctIds.personId,
              rows.map((r) => r.id),
            ),
          ),
        )
        .orderBy(asc(personDistinctIds.createdAt), asc(personDistinctIds.id));

      const distinctIds = new Map<string, string[]>();
      for (const row of distinctRows) {
        const list = distinctIds.get(row.personId) ?? [];
        list.push(row.distinctId);
        distinctIds.set(row.personId, list);
      }

      return rows.map((row) => {
        const ids = distinctIds.get(row.id) ?? [];
        return {
          id: row.id,
          name: personName(row.id, row.properties, ids),
          distinctIds: ids,
          properties: row.properties,
          isIdentified: row.isIdentified,
          createdAt: row.createdAt ? row.createdAt.toISOString() : null,
        };
      });
    });
  }
}
