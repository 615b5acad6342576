import { ValidationError, errorMessage } from "./errors";

export interface DateWindow {
  since: Date;
  until: Date;
}

const DURATION_UNIT_DAYS: Record<string, number> = {
  y: 365, // approximate
  m: 30, // approximate
  w: 7,
  d: 1,
};

const DEFAULT_SINCE = "4w";

/**
 * Calendar arithmetic in UTC, which is what the databrowser epoch range uses
 */
export function addDays(date: Date, days: number): Date {
  const result = new Date(date.getTime());
  result.setUTCDate(result.getUTCDate() + days);
  return result;
}

export function startOfUTCDay(date: Date): Date {
  return new Date(
    Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate())
  );
}

/**
 * Monday on or after the given date, at midnight UTC
 */
export function nextMonday(date: Date): Date {
  const day = startOfUTCDay(date);
  const daysUntilMonday = (8 - day.getUTCDay()) % 7;
  return addDays(day, daysUntilMonday);
}

/**
 * Monday on or before the given date, at midnight UTC
 */
export function startOfWeek(date: Date): Date {
  const day = startOfUTCDay(date);
  const utcDay = day.getUTCDay();
  const daysSinceMonday = utcDay === 0 ? 6 : utcDay - 1;
  return addDays(day, -daysSinceMonday);
}

/**
 * Last second of the Sunday on or after the given date
 */
export function endOfWeek(date: Date): Date {
  const day = startOfUTCDay(date);
  const daysUntilSunday = (7 - day.getUTCDay()) % 7;
  const sunday = addDays(day, daysUntilSunday);
  sunday.setUTCHours(23, 59, 59, 0);
  return sunday;
}

export function formatDate(date: Date): string {
  return date.toISOString().split("T")[0];
}

export function toEpochSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}

function utcDate(year: number, monthIndex: number, day: number): Date {
  const date = new Date(Date.UTC(year, monthIndex, day));
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== monthIndex ||
    date.getUTCDate() !== day
  ) {
    throw new ValidationError(`invalid calendar date: ${year}-${monthIndex + 1}-${day}`);
  }
  return date;
}

/**
 * Parse YYYY-MM-DD, YYYY-MM (last day of that month) or YYYY (31 December)
 */
export function parseCalendarDate(input: string): Date {
  const value = input.trim();

  let match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value);
  if (match) {
    return utcDate(Number(match[1]), Number(match[2]) - 1, Number(match[3]));
  }

  match = /^(\d{4})-(\d{2})$/.exec(value);
  if (match) {
    const year = Number(match[1]);
    const month = Number(match[2]);
    if (month < 1 || month > 12) {
      throw new ValidationError(`invalid month: ${value}`);
    }
    // day 0 of the following month is the last day of this one
    return new Date(Date.UTC(year, month, 0));
  }

  match = /^(\d{4})$/.exec(value);
  if (match) {
    return utcDate(Number(match[1]), 11, 31);
  }

  throw new ValidationError(
    "invalid date format. Use YYYY-MM-DD, YYYY-MM, or YYYY"
  );
}

/**
 * The databrowser pages are week based, so every upper bound snaps forward to a Monday
 */
export function parseUntilDate(input: string): Date {
  return nextMonday(parseCalendarDate(input));
}

/**
 * Parse a single-unit duration such as 30d, 2w, 6m or 1y into a number of days.
 * Returns undefined when the input is not a duration.
 */
export function parseDurationDays(input: string): number | undefined {
  const match = /^([0-9]+)([ywdm])$/.exec(input.trim());
  if (!match) return undefined;
  return Number(match[1]) * DURATION_UNIT_DAYS[match[2]];
}

/**
 * A since value is either a duration counted back from until, or a date
 */
export function parseSinceDate(input: string, until: Date): Date {
  const days = parseDurationDays(input);
  if (days !== undefined) {
    const since = addDays(until, -days);
    if (Number.isNaN(since.getTime())) {
      throw new ValidationError(`duration out of range: ${input.trim()}`);
    }
    return since;
  }
  return parseUntilDate(input);
}

/**
 * Resolve and validate the download window before any network activity
 */
export function validateAndParseDates(
  options: { until?: string; since?: string },
  now: Date = new Date()
): DateWindow {
  let until: Date;
  try {
    until = options.until ? parseUntilDate(options.until) : nextMonday(now);
  } catch (error) {
    throw new ValidationError(`failed to parse until date: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  let since: Date;
  try {
    since = parseSinceDate(options.since || DEFAULT_SINCE, until);
  } catch (error) {
    throw new ValidationError(`failed to parse since date: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  if (since.getTime() >= until.getTime()) {
    throw new ValidationError(
      `--since date (${formatDate(since)}) must be before --until date (${formatDate(until)})`
    );
  }

  return { since, until };
}
