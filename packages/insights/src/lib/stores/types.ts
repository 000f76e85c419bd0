import type { MathMode } from "@sightline/shared/filters";
import type { EventFilter } from "../event-filter.js";

// ---------------------------------------------------------------------------
// Actions
// ---------------------------------------------------------------------------

export type UrlMatching = "exact" | "contains" | "regex";

/** One matching rule of an action. Unset fields do not constrain the match. */
export interface ActionStep {
  event: string | null;
  url: string | null;
  urlMatching: UrlMatching | null;
  tagName: string | null;
  text: string | null;
  href: string | null;
  selector: string | null;
}

export interface ActionDefinition {
  id: string;
  name: string;
  steps: ActionStep[];
}

// ---------------------------------------------------------------------------
// Entity matching
// ---------------------------------------------------------------------------

/** Which events of a team belong to an entity. */
export type EntityMatch =
  | { teamId: string; kind: "event"; event: string }
  | { teamId: string; kind: "action"; steps: ActionStep[] };

// ---------------------------------------------------------------------------
// Store rows
// ---------------------------------------------------------------------------

export interface DayCountRow {
  /** Calendar day, `YYYY-MM-DD`. */
  day: string;
  count: number;
}

export interface PropertyCountRow {
  /** Decoded property value, one row per value; `null` when absent, JSON null or empty. */
  value: string | null;
  count: number;
}

export interface ActiveDaysRow {
  /** Distinct active days per actor. */
  dayCount: number;
  /** Number of actors active on exactly `dayCount` days. */
  actors: number;
}

// ---------------------------------------------------------------------------
// Stores
// ---------------------------------------------------------------------------

export interface EventStore {
  countByDay(match: EntityMatch, filter: EventFilter, math: MathMode): Promise<DayCountRow[]>;
  countByProperty(
    match: EntityMatch,
    filter: EventFilter,
    key: string,
    math: MathMode,
  ): Promise<PropertyCountRow[]>;
  /** Histogram of distinct active days per actor, ignoring actors above `maxDays`. */
  stickinessHistogram(
    match: EntityMatch,
    filter: EventFilter,
    maxDays: number,
  ): Promise<ActiveDaysRow[]>;
  /** Day of the earliest matching event, or `null` when nothing matches. */
  firstEventDay(match: EntityMatch, filter: EventFilter): Promise<string | null>;
  distinctActors(match: EntityMatch, filter: EventFilter, limit: number): Promise<string[]>;
  /** Actors active on exactly `days` distinct days. */
  actorsActiveOnDays(
    match: EntityMatch,
    filter: EventFilter,
    days: number,
    limit: number,
  ): Promise<string[]>;
}

export interface ActionStore {
  /** A non-deleted action of the team, or `null`. */
  getAction(teamId: string, actionId: string): Promise<ActionDefinition | null>;
  /** The team's non-deleted actions, newest first. */
  listActions(teamId: string): Promise<ActionDefinition[]>;
}

export interface PersonProfile {
  id: string;
  name: string;
  distinctIds: string[];
  properties: Record<string, unknown>;
  isIdentified: boolean;
  createdAt: string | null;
}

export interface PeopleStore {
  getPeople(teamId: string, personIds: string[]): Promise<PersonProfile[]>;
}
