import { z } from "zod";

// ---------------------------------------------------------------------------
// Identifiers
// ---------------------------------------------------------------------------

/** UUID string. */
export const Uuid = z.string().uuid();

/** Team identifier; every store call is scoped to one. */
export const TeamId = Uuid;
export type TeamId = z.infer<typeof TeamId>;

/** Action identifier. */
export const ActionId = Uuid;

// ---------------------------------------------------------------------------
// Stickiness
// ---------------------------------------------------------------------------

/** Exact number of distinct active days for a stickiness people lookup. */
export const StickinessDays = z.coerce.number().int().min(1);
