import { ErrorCode, SightlineError } from "@sightline/shared/errors";
import {
  endOfMonth,
  endOfYear,
  format,
  isValid,
  parseISO,
  startOfMonth,
  startOfYear,
  subDays,
  subMonths,
  subWeeks,
  subYears,
} from "date-fns";

const ABSOLUTE_DAY = /^\d{4}-\d{2}-\d{2}$/;

/** `-7d`, `-1w`, `-3m`, `mStart`, `-1yEnd`, … */
const RELATIVE_DAY = /^-?(\d+)?([dwmy])(Start|End)?$/;

export const DAY_FORMAT = "yyyy-MM-dd";

function invalidDate(input: string): SightlineError {
  return new SightlineError(
    ErrorCode.QUERY.INVALID_DATE,
    `Invalid date expression: "${input}"`,
    400,
    { value: input },
  );
}

/**
 * Resolve an absolute (`2020-01-31`) or relative (`-7d`, `-1mStart`) date
 * expression to a calendar day, relative expressions counting back from `now`.
 *
 * `Start`/`End` snap to the bounds of the month (`m`) or year (`y`) and are
 * rejected for days and weeks.
 */
export function parseRelativeDate(input: string, now: Date): string {
  if (ABSOLUTE_DAY.test(input)) {
    const date = parseISO(input);
    // Round trip rejects impossible days such as 2020-02-31.
    if (!isValid(date) || format(date, DAY_FORMAT) !== input) throw invalidDate(input);
    return input;
  }

  const match = RELATIVE_DAY.exec(input);
  if (!match) throw invalidDate(input);

  const [, rawAmount, unit, position] = match;
  const amount = rawAmount ? Number.parseInt(rawAmount, 10) : 0;

  let date: Date;
  switch (unit) {
    case "d":
      if (position) throw invalidDate(input);
      date = subDays(now, amount);
      break;
    case "w":
      if (position) throw invalidDate(input);
      date = subWeeks(now, amount);
      break;
    case "m":
      date = subMonths(now, amount);
      if (position === "Start") date = startOfMonth(date);
      if (position === "End") date = endOfMonth(date);
      break;
    default:
      date = subYears(now, amount);
      if (position === "Start") date = startOfYear(date);
      if (position === "End") date = endOfYear(date);
  }

  return format(date, DAY_FORMAT);
}
