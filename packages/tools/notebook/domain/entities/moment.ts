// Moment entity - the concrete temporal values records carry

import { TZDate } from "@date-fns/tz";
import { addDays, format, isValid } from "date-fns";

/** A calendar day with no time-of-day. `month` is 1-based. */
export type CalendarDate = {
  readonly kind: "date";
  readonly year: number;
  readonly month: number;
  readonly day: number;
};

/** An instant, carried in the zone it was resolved in. */
export type Timestamp = {
  readonly kind: "datetime";
  readonly at: TZDate;
};

export type Moment = CalendarDate | Timestamp;

export function calendarDate(
  year: number,
  month: number,
  day: number,
): CalendarDate {
  return { kind: "date", year, month, day };
}

/** Build a calendar date, or null when the fields name no real day (e.g. 2022-02-30). */
export function tryCalendarDate(
  year: number,
  month: number,
  day: number,
): CalendarDate | null {
  if (month < 1 || month > 12 || day < 1) return null;
  const probe = new Date(Date.UTC(year, month - 1, day));
  if (probe.getUTCMonth() !== month - 1 || probe.getUTCDate() !== day) {
    return null;
  }
  return calendarDate(year, month, day);
}

export function timestamp(at: TZDate): Timestamp {
  return { kind: "datetime", at };
}

/** Far-future sentinel for records that never stop being relevant. */
export const NEVER: CalendarDate = calendarDate(2100, 1, 1);

// Years a stored moment can be written and read back in
const MIN_YEAR = 1;
const MAX_YEAR = 9999;

/** A valid date whose year fits the four-digit stored form. */
export function isStorableDate(date: Date): boolean {
  if (!isValid(date)) return false;
  const year = date.getFullYear();
  return year >= MIN_YEAR && year <= MAX_YEAR;
}

/** Midnight UTC of a calendar date, for zone-independent day arithmetic. */
export function dateToUtc(date: CalendarDate): TZDate {
  return new TZDate(date.year, date.month - 1, date.day, 0, 0, 0, 0, "UTC");
}

/** The calendar day of a date, read through its own zone when it is a TZDate. */
export function dateOf(date: Date): CalendarDate {
  return calendarDate(date.getFullYear(), date.getMonth() + 1, date.getDate());
}

export function toCalendarDate(moment: Moment): CalendarDate {
  return moment.kind === "date" ? moment : dateOf(moment.at);
}

export function startOfDayIn(date: CalendarDate, timeZone: string): Timestamp {
  return timestamp(
    new TZDate(date.year, date.month - 1, date.day, 0, 0, 0, 0, timeZone),
  );
}

/** Shift by whole days, keeping the wall-clock time of timestamps. */
export function addDaysTo(moment: Moment, days: number): Moment {
  switch (moment.kind) {
    case "date":
      return dateOf(addDays(dateToUtc(moment), days));
    case "datetime":
      return timestamp(addDays(moment.at, days));
  }
}

/** Weekday with Monday = 0 ... Sunday = 6. */
export function weekdayIndex(date: CalendarDate): number {
  return (dateToUtc(date).getDay() + 6) % 7;
}

function compareDates(a: CalendarDate, b: CalendarDate): number {
  return a.year - b.year || a.month - b.month || a.day - b.day;
}

/**
 * Order two moments. When either side is date-only the other is truncated
 * to its day first, so a date compares equal to every instant on that day.
 */
export function compareMoments(a: Moment, b: Moment): number {
  if (a.kind === "datetime" && b.kind === "datetime") {
    return Math.sign(a.at.getTime() - b.at.getTime());
  }
  return Math.sign(compareDates(toCalendarDate(a), toCalendarDate(b)));
}

function formatDate(date: CalendarDate): string {
  const year = String(date.year).padStart(4, "0");
  const month = String(date.month).padStart(2, "0");
  const day = String(date.day).padStart(2, "0");
  return `${year}-${month}-${day}`;
}

/** Short display form: "2022-05-03" or "2022-05-03 14:30". */
export function formatMoment(moment: Moment): string {
  switch (moment.kind) {
    case "date":
      return formatDate(moment);
    case "datetime":
      return format(moment.at, "yyyy-MM-dd HH:mm");
  }
}

/** Storage form: "2022-05-03" or "2022-05-03T14:30:00-07:00". */
export function serializeMoment(moment: Moment): string {
  switch (moment.kind) {
    case "date":
      return formatDate(moment);
    case "datetime":
      return format(moment.at, "yyyy-MM-dd'T'HH:mm:ssxxx");
  }
}

// YAML 1.1 timestamp shape: date, optionally followed by a time and a zone
const STORED_TIMESTAMP =
  /^(\d{4})-(\d{1,2})-(\d{1,2})(?:(?:[Tt]|[ \t]+)(\d{1,2}):(\d{2}):(\d{2})(?:\.(\d*))?(?:[ \t]*(Z|[-+]\d{1,2}(?::?\d{2})?))?)?$/;

/**
 * Read a stored ISO date or timestamp string into a concrete moment.
 *
 * Timestamps written without an offset come from a serializer that dropped
 * the zone after shifting the fields to UTC, so their fields are read as UTC
 * wall-clock. Every timestamp is returned in `timeZone`.
 * Returns null when the string is not a stored timestamp.
 */
export function readStoredMoment(
  value: string,
  timeZone: string,
): Moment | null {
  const match = value.trim().match(STORED_TIMESTAMP);
  if (!match) return null;

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const date = tryCalendarDate(year, month, day);
  if (!date) return null;
  if (match[4] === undefined) return date;

  const hour = Number(match[4]);
  const minute = Number(match[5]);
  const second = Number(match[6]);
  if (hour > 23 || minute > 59 || second > 59) return null;
  const millis = Number((match[7] ?? "").padEnd(3, "0").slice(0, 3));

  let utcMillis = Date.UTC(year, month - 1, day, hour, minute, second, millis);
  const zone = match[8];
  if (zone && zone !== "Z") {
    const sign = zone.startsWith("-") ? -1 : 1;
    const digits = zone.slice(1).replace(":", "");
    const offsetHours = Number(digits.length > 2 ? digits.slice(0, -2) : digits);
    const offsetMinutes = digits.length > 2 ? Number(digits.slice(-2)) : 0;
    utcMillis -= sign * (offsetHours * 60 + offsetMinutes) * 60_000;
  }
  return timestamp(new TZDate(utcMillis, timeZone));
}
