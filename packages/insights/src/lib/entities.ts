import type { EntityFilter, EntityType, MathMode, PropertyFilter } from "@sightline/shared/filters";
import type { ActionDefinition, ActionStep, EntityMatch } from "./stores/types.js";

/** A requested unit of analysis: a raw event name or a resolved action. */
export type EntityDescriptor =
  | { type: "events"; id: string; name: string; filters: EntityFilter }
  | { type: "actions"; id: string; name: string; steps: ActionStep[]; filters: EntityFilter };

/** The entity as echoed back on every result. */
export interface EntityEcho {
  id: string;
  name: string;
  type: EntityType;
  math?: MathMode;
  properties?: PropertyFilter[];
  breakdown?: string;
}

export function eventEntity(filters: EntityFilter): EntityDescriptor {
  return { type: "events", id: filters.id, name: filters.id, filters };
}

export function actionEntity(action: ActionDefinition, filters: EntityFilter): EntityDescriptor {
  return { type: "actions", id: action.id, name: action.name, steps: action.steps, filters };
}

export function entityMatch(teamId: string, entity: EntityDescriptor): EntityMatch {
  return entity.type === "events"
    ? { teamId, kind: "event", event: entity.name }
    : { teamId, kind: "action", steps: entity.steps };
}

export function echoEntity(entity: EntityDescriptor): EntityEcho {
  const { math, properties, breakdown } = entity.filters;
  return {
    id: entity.id,
    name: entity.name,
    type: entity.type,
    ...(math ? { math } : {}),
    ...(properties && properties.length > 0 ? { properties } : {}),
    ...(breakdown ? { breakdown } : {}),
  };
}
