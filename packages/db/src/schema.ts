import { sql } from "drizzle-orm";
import {
  boolean,
  index,
  jsonb,
  pgTable,
  text,
  timestamp,
  uniqueIndex,
  uuid,
} from "drizzle-orm/pg-core";

// =============================================================================
// 1. Teams
// =============================================================================

export const teams = pgTable("teams", {
  id: uuid("id").primaryKey().defaultRandom(),
  name: text("name").notNull(),
  createdAt: timestamp("created_at", { withTimezone: true }).defaultNow(),
});

// =============================================================================
// 2. Persons
// =============================================================================

export const persons = pgTable(
  "persons",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    teamId: uuid("team_id")
      .notNull()
      .references(() => teams.id, { onDelete: "cascade" }),
    properties: jsonb("properties")
      .$type<Record<string, unknown>>()
      .notNull()
      .default(sql`'{}'::jsonb`),
    isIdentified: boolean("is_identified").notNull().default(false),
    createdAt: timestamp("created_at", { withTimezone: true }).defaultNow(),
  },
  (table) => [index("idx_persons_team").on(table.teamId)],
);

// =============================================================================
// 3. Person distinct ids (anonymous and identified ids merged into a person)
// =============================================================================

export const personDistinctIds = pgTable(
  "person_distinct_ids",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    teamId: uuid("team_id")
      .notNull()
      .references(() => teams.id, { onDelete: "cascade" }),
    personId: uuid("person_id")
      .notNull()
      .references(() => persons.id, { onDelete: "cascade" }),
    distinctId: text("distinct_id").notNull(),
    createdAt: timestamp("created_at", { withTimezone: true }).defaultNow(),
  },
  (table) => [
    uniqueIndex("person_distinct_ids_team_distinct_unique").on(table.teamId, table.distinctId),
    index("idx_person_distinct_ids_person").on(table.personId),
  ],
);

// =============================================================================
// 4. Actions
// =============================================================================

export const actions = pgTable(
  "actions",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    teamId: uuid("team_id")
      .notNull()
      .references(() => teams.id, { onDelete: "cascade" }),
    name: text("name").notNull(),
    deleted: boolean("deleted").notNull().default(false),
    createdAt: timestamp("created_at", { withTimezone: true }).defaultNow(),
  },
  (table) => [index("idx_actions_team").on(table.teamId)],
);

// =============================================================================
// 5. Action steps (an action matches an event when any of its steps does)
// =============================================================================

export const actionSteps = pgTable(
  "action_steps",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    actionId: uuid("action_id")
      .notNull()
      .references(() => actions.id, { onDelete: "cascade" }),
    event: text("event"),
    url: text("url"),
    urlMatching: text("url_matching", { enum: ["exact", "contains", "regex"] }),
    tagName: text("tag_name"),
    text: text("text"),
    href: text("href"),
    selector: text("selector"),
    name: text("name"),
    createdAt: timestamp("created_at", { withTimezone: true }).defaultNow(),
  },
  (table) => [index("idx_action_steps_action").on(table.actionId)],
);
