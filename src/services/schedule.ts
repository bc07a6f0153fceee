import { differenceInCalendarDays, differenceInCalendarMonths, differenceInCalendarWeeks, isValid, parseISO } from "date-fns";
import type { IApp, IDevice } from "../models/Device";

/**
 * Schedule predicates.
 *
 * All of them take the wall-clock time of the device (see `localize`), so the
 * same instant can be "night" for one device and "day" for another.
 */

const WEEKDAYS = ["sunday", "monday", "tuesday", "wednesday", "thursday", "friday", "saturday"] as const;

const OCCURRENCES: Record<string, number> = {
  first: 1,
  second: 2,
  third: 3,
  fourth: 4,
};

const DEFAULT_RECURRENCE_START = "2025-01-01";

export interface LocalTime {
  year: number;
  /** 1-12 */
  month: number;
  day: number;
  hour: number;
  minute: number;
  /** 0 = Sunday */
  weekday: number;
  /** Zero-padded `HH:MM`. */
  hhmm: string;
  /** Local calendar date at midnight, for calendar arithmetic. */
  date: Date;
}

const formatters = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timeZone: string | undefined): Intl.DateTimeFormat {
  const key = timeZone ?? "";
  let formatter = formatters.get(key);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat("en-US", {
      timeZone,
      hourCycle: "h23",
      year: "numeric",
      month: "numeric",
      day: "numeric",
      hour: "numeric",
      minute: "numeric",
      weekday: "long",
    });
    formatters.set(key, formatter);
  }
  return formatter;
}

function isKnownTimeZone(timeZone: string): boolean {
  try {
    formatterFor(timeZone);
    return true;
  } catch {
    return false;
  }
}

/**
 * Converts an instant to wall-clock fields in `timeZone`.
 * Unknown or empty zones use the process zone.
 */
export function localize(now: Date, timeZone?: string | null): LocalTime {
  const zone = timeZone && isKnownTimeZone(timeZone) ? timeZone : undefined;
  const parts = formatterFor(zone).formatToParts(now);
  const field = (type: Intl.DateTimeFormatPartTypes): string =>
    parts.find(part => part.type === type)?.value ?? "";

  const year = parseInt(field("year"), 10);
  const month = parseInt(field("month"), 10);
  const day = parseInt(field("day"), 10);
  const hour = parseInt(field("hour"), 10) % 24;
  const minute = parseInt(field("minute"), 10);
  const weekdayName = field("weekday").toLowerCase();
  const weekdayIndex = WEEKDAYS.findIndex(name => name === weekdayName);

  return {
    year,
    month,
    day,
    hour,
    minute,
    weekday: weekdayIndex >= 0 ? weekdayIndex : new Date(year, month - 1, day).getDay(),
    hhmm: `${pad(hour)}:${pad(minute)}`,
    date: new Date(year, month - 1, day),
  };
}

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/** Normalizes `H:MM` / `HH:MM[:SS]` to `HH:MM`; anything else yields the fallback. */
export function normalizeTimeOfDay(value: string | null | undefined, fallback: string): string {
  if (!value) return fallback;
  const match = /^(\d{1,2}):(\d{2})/.exec(value.trim());
  if (!match) return fallback;
  const hour = parseInt(match[1], 10);
  const minute = parseInt(match[2], 10);
  if (hour > 23 || minute > 59) return fallback;
  return `${pad(hour)}:${pad(minute)}`;
}

/** Closed window `[start, end]`, wrapping past midnight when start > end. */
export function isWithinTimeWindow(current: string, start: string, end: string): boolean {
  if (start > end) {
    return current >= start || current <= end;
  }
  return current >= start && current <= end;
}

/** Half-open window `[start, end)`, wrapping past midnight when start > end. */
function isWithinHalfOpenWindow(current: string, start: string, end: string): boolean {
  if (start > end) {
    return current >= start || current < end;
  }
  return current >= start && current < end;
}

export function isNightModeActive(device: IDevice, now: Date): boolean {
  if (!device.nightModeEnabled) return false;
  const local = localize(now, device.timezone);
  const start = normalizeTimeOfDay(device.nightStart, "22:00");
  const end = normalizeTimeOfDay(device.nightEnd, "06:00");
  return isWithinHalfOpenWindow(local.hhmm, start, end);
}

/** Dim mode runs from `dimTime` until the end of the night window. */
export function isDimModeActive(device: IDevice, now: Date): boolean {
  if (!device.dimTime) return false;
  const local = localize(now, device.timezone);
  const start = normalizeTimeOfDay(device.dimTime, "");
  if (!start) return false;
  const end = normalizeTimeOfDay(device.nightEnd, "06:00");
  return isWithinHalfOpenWindow(local.hhmm, start, end);
}

export function isScheduleActive(app: IApp, device: IDevice, now: Date): boolean {
  return isScheduleActiveAt(app, localize(now, device.timezone));
}

/**
 * Time-of-day window AND day filter. The day filter is the legacy `days`
 * list unless custom recurrence is switched on.
 */
export function isScheduleActiveAt(app: IApp, local: LocalTime): boolean {
  const start = normalizeTimeOfDay(app.startTime, "00:00");
  const end = normalizeTimeOfDay(app.endTime, "23:59");

  if (!isWithinTimeWindow(local.hhmm, start, end)) {
    return false;
  }

  if (app.useCustomRecurrence && app.recurrenceType) {
    return isRecurrenceActive(app, local);
  }

  if (!app.days || app.days.length === 0) {
    return true;
  }
  const today = WEEKDAYS[local.weekday];
  return app.days.some(day => day.trim().toLowerCase() === today);
}

function parseDate(value: string | null | undefined): Date | null {
  if (!value) return null;
  const parsed = parseISO(value);
  return isValid(parsed) ? parsed : null;
}

export function isRecurrenceActive(app: IApp, local: LocalTime): boolean {
  const startDate = parseDate(app.recurrenceStartDate) ?? parseISO(DEFAULT_RECURRENCE_START);
  const endDate = parseDate(app.recurrenceEndDate);
  const current = local.date;

  if (current < startDate) return false;
  if (endDate && current > endDate) return false;

  const interval = app.recurrenceInterval > 0 ? app.recurrenceInterval : 1;
  const pattern = app.recurrencePattern ?? {};

  switch (app.recurrenceType) {
    case "daily": {
      const daysSince = differenceInCalendarDays(current, startDate);
      return daysSince % interval === 0;
    }

    case "weekly": {
      // Weeks are counted from the Monday-based week containing the start date
      const weeksSince = differenceInCalendarWeeks(current, startDate, { weekStartsOn: 1 });
      if (weeksSince % interval !== 0) return false;

      const weekdays = (pattern.weekdays ?? []).map(day => day.trim().toLowerCase());
      if (weekdays.length === 0) return true;
      return weekdays.includes(WEEKDAYS[local.weekday]);
    }

    case "monthly": {
      const monthsSince = differenceInCalendarMonths(current, startDate);
      if (monthsSince % interval !== 0) return false;

      if (typeof pattern.dayOfMonth === "number") {
        return local.day === pattern.dayOfMonth;
      }
      if (pattern.dayOfWeek) {
        return matchesMonthlyWeekday(local, pattern.dayOfWeek);
      }
      return true;
    }

    case "yearly": {
      const yearsSince = local.year - startDate.getFullYear();
      if (yearsSince % interval !== 0) return false;
      return local.month === startDate.getMonth() + 1 && local.day === startDate.getDate();
    }

    default:
      return false;
  }
}

/** Matches tokens such as `first_monday` or `last_friday` against a local date. */
export function matchesMonthlyWeekday(local: LocalTime, token: string): boolean {
  const [occurrence, weekday] = token.trim().toLowerCase().split("_");
  if (!occurrence || !weekday) return false;
  if (WEEKDAYS[local.weekday] !== weekday) return false;

  if (occurrence === "last") {
    const daysInMonth = new Date(local.year, local.month, 0).getDate();
    return local.day + 7 > daysInMonth;
  }

  const nth = OCCURRENCES[occurrence];
  if (!nth) return false;
  return Math.floor((local.day - 1) / 7) + 1 === nth;
}
