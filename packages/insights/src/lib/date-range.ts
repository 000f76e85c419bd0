import { ErrorCode, SightlineError } from "@sightline/shared/errors";
import { addDays, differenceInCalendarDays, eachDayOfInterval, format, parseISO } from "date-fns";
import { DAY_FORMAT, parseRelativeDate } from "./relative-date.js";

const DEFAULT_LOOKBACK_DAYS = 7;

/** Sentinel `date_from` meaning "since the first matching event". */
export const ALL_TIME = "all";

/**
 * A resolved query window of calendar days (`YYYY-MM-DD`), both ends
 * inclusive. `dateFrom` is `null` when the window is unbounded.
 */
export interface DateRange {
  dateFrom: string | null;
  dateTo: string;
}

export interface DateRangeInput {
  dateFrom?: string;
  dateTo?: string;
}

export function resolveDateRange(input: DateRangeInput, now: Date = new Date()): DateRange {
  let dateFrom: string | null;
  if (!input.dateFrom) {
    dateFrom = format(addDays(now, -DEFAULT_LOOKBACK_DAYS), DAY_FORMAT);
  } else if (input.dateFrom === ALL_TIME) {
    dateFrom = null;
  } else {
    dateFrom = parseRelativeDate(input.dateFrom, now);
  }

  const dateTo = input.dateTo ? parseRelativeDate(input.dateTo, now) : format(now, DAY_FORMAT);

  if (dateFrom !== null && dateFrom > dateTo) {
    throw new SightlineError(
      ErrorCode.QUERY.INVALID_DATE_RANGE,
      `date_from (${dateFrom}) is after date_to (${dateTo})`,
      400,
      { dateFrom, dateTo },
    );
  }

  return { dateFrom, dateTo };
}

/** Shift a calendar day by `amount` days. */
export function shiftDay(day: string, amount: number): string {
  return format(addDays(parseISO(day), amount), DAY_FORMAT);
}

/** Whole calendar days from `from` to `to` (0 when equal). */
export function daysBetween(from: string, to: string): number {
  return differenceInCalendarDays(parseISO(to), parseISO(from));
}

/** Every calendar day in `[from, to]`, in order. */
export function eachDay(from: string, to: string): string[] {
  return eachDayOfInterval({ start: parseISO(from), end: parseISO(to) }).map((d) =>
    format(d, DAY_FORMAT),
  );
}
