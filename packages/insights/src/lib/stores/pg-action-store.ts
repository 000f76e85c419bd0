import type { Database } from "@sightline/db/client";
import { actionSteps, actions } from "@sightline/db/schema";
import { ActionId } from "@sightline/shared/validation";
import { and, asc, desc, eq, inArray } from "drizzle-orm";
import type { FastifyBaseLogger } from "fastify";
import { withPostgres } from "./postgres.js";
import type { ActionDefinition, ActionStep, ActionStore } from "./types.js";

type StepRow = typeof actionSteps.$inferSelect;

function toStep(row: StepRow): ActionStep {
  return {
    event: row.event,
    url: row.url,
    urlMatching: row.urlMatching,
    tagName: row.tagName,
    text: row.text,
    href: row.href,
    selector: row.selector,
  };
}

/** Action Store over the `actions` and `action_steps` tables. */
export class PgActionStore implements ActionStore {
  constructor(
    private readonly db: Database,
    private readonly logger?: FastifyBaseLogger,
  ) {}

  async getAction(teamId: string, actionId: string): Promise<ActionDefinition | null> {
    if (!ActionId.safeParse(actionId).success) return null;

    return withPostgres("getAction", this.logger, async () => {
      const rows = await this.db
        .select({ id: actions.id, name: actions.name })
        .from(actions)
        .where(
          and(eq(actions.id, actionId), eq(actions.teamId, teamId), eq(actions.deleted, false)),
        )
        .limit(1);

      const action = rows[0];
      if (!action) return null;

      const steps = await this.loadSteps([action.id]);
      return { ...action, steps: steps.get(action.id) ?? [] };
    });
  }

  async listActions(teamId: string): Promise<ActionDefinition[]> {
    return withPostgres("listActions", this.logger, async () => {
      const rows = await this.db
        .select({ id: actions.id, name: actions.name })
        .from(actions)
        .where(and(eq(actions.teamId, teamId), eq(actions.deleted, false)))
        .orderBy(desc(actions.createdAt), desc(actions.id));

      if (rows.length === 0) return [];

      const steps = await this.loadSteps(rows.map((r) => r.id));
      return rows.map((action) => ({ ...action, steps: steps.get(action.id) ?? [] }));
    });
  }

  private async loadSteps(actionIds: string[]): Promise<Map<string, ActionStep[]>> {
    const rows = await this.db
      .select()
      .from(actionSteps)
      .where(inArray(actionSteps.actionId, actionIds))
      .orderBy(asc(actionSteps.createdAt), asc(actionSteps.id));

    const byAction = new Map<string, ActionStep[]>();
    for (const row of rows) {
      const list = byAction.get(row.actionId) ?? [];
      list.push(toStep(row));
      byAction.set(row.actionId, list);
    }
    return byAction;
  }
}
