/**
 * Use Case: ResolveMoment
 *
 * Turns the temporal expressions written in record files ("3 days",
 * "next friday", "2022-05-03 09 am", "never", ...) into concrete moments,
 * relative to a reference moment.
 *
 * Dependencies: none besides the configured time zone.
 */

import { TZDate } from "@date-fns/tz";
import {
  addBusinessDays,
  addDays,
  addHours,
  addMonths,
  addWeeks,
  addYears,
  isWeekend,
  nextMonday,
} from "date-fns";
import { NbError } from "../entities/errors.ts";
import {
  dateOf,
  dateToUtc,
  isStorableDate,
  type Moment,
  NEVER,
  readStoredMoment,
  startOfDayIn,
  timestamp,
  toCalendarDate,
  tryCalendarDate,
  weekdayIndex,
} from "../entities/moment.ts";

export const WEEKDAYS = [
  "monday",
  "tuesday",
  "wednesday",
  "thursday",
  "friday",
  "saturday",
  "sunday",
] as const;

export const DELTA_UNITS = [
  "hour",
  "day",
  "week",
  "month",
  "year",
  "business day",
] as const;

export type DeltaUnit = typeof DELTA_UNITS[number];

const WEEKDAY_PATTERN = WEEKDAYS.join("|");

const TIME_OF_DAY = /^(\d{2}):(\d{2})$/;
const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const DATE_AND_HOUR = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}) (am|pm)$/;
const DELTA = new RegExp(`^(\\d+) (${DELTA_UNITS.join("|")})s?$`);
const WEEKDAY = new RegExp(`^(${WEEKDAY_PATTERN})$`);
const NEXT_WEEKDAY = new RegExp(`^next (${WEEKDAY_PATTERN})$`);

const DAY_WORDS: ReadonlyMap<string, number> = new Map([
  ["today", 0],
  ["tomorrow", 1],
  ["yesterday", -1],
]);

export type MomentExpression = string | Moment | null | undefined;

export class MomentResolver {
  constructor(private readonly timeZone: string) {}

  /**
   * Resolve `expression` relative to `reference`.
   *
   * Absent or empty expressions resolve to null; moments pass through.
   * Throws `unrecognized_expression` when no rule matches.
   */
  resolve(expression: MomentExpression, reference: Moment): Moment | null {
    if (expression === null || expression === undefined || expression === "") {
      return null;
    }
    if (typeof expression !== "string") {
      return expression;
    }

    const text = expression.toLowerCase();
    const result = this.match(text, reference);
    if (!result) {
      throw new NbError(
        "unrecognized_expression",
        `Unrecognized temporal expression: ${expression}`,
      );
    }
    return result;
  }

  /**
   * Like `resolve`, but a stored ISO date or timestamp string is first read
   * as that concrete moment (see `readStoredMoment`).
   */
  resolveStored(expression: MomentExpression, reference: Moment): Moment | null {
    if (typeof expression === "string") {
      const stored = readStoredMoment(expression, this.timeZone);
      if (stored) return stored;
    }
    return this.resolve(expression, reference);
  }

  private match(text: string, reference: Moment): Moment | null {
    if (text === "never") {
      return NEVER;
    }

    let m = text.match(TIME_OF_DAY);
    if (m) {
      return this.atTimeOfDay(reference, Number(m[1]), Number(m[2]));
    }

    m = text.match(ISO_DATE);
    if (m) {
      return tryCalendarDate(Number(m[1]), Number(m[2]), Number(m[3]));
    }

    m = text.match(DATE_AND_HOUR);
    if (m) {
      const date = tryCalendarDate(Number(m[1]), Number(m[2]), Number(m[3]));
      const hour = Number(m[4]);
      if (!date || hour < 1 || hour > 12) return null;
      const hour24 = (hour % 12) + (m[5] === "pm" ? 12 : 0);
      return timestamp(
        new TZDate(
          date.year,
          date.month - 1,
          date.day,
          hour24,
          0,
          0,
          0,
          this.timeZone,
        ),
      );
    }

    m = text.match(DELTA);
    if (m) {
      return this.shift(reference, parseDeltaUnit(m[2]), Number(m[1]));
    }

    m = text.match(WEEKDAY);
    if (m) {
      // Floating week: may land before the reference day
      const date = toCalendarDate(reference);
      const offset = weekdayOffset(m[1]) - weekdayIndex(date);
      return dateOf(addDays(dateToUtc(date), offset));
    }

    m = text.match(NEXT_WEEKDAY);
    if (m) {
      const date = toCalendarDate(reference);
      const nextMonday = addDays(dateToUtc(date), 7 - weekdayIndex(date));
      return dateOf(addDays(nextMonday, weekdayOffset(m[1])));
    }

    const days = DAY_WORDS.get(text);
    if (days !== undefined) {
      return dateOf(addDays(dateToUtc(toCalendarDate(reference)), days));
    }

    return null;
  }

  private atTimeOfDay(
    reference: Moment,
    hour: number,
    minute: number,
  ): Moment | null {
    if (hour > 23 || minute > 59) return null;
    const zone = reference.kind === "datetime"
      ? reference.at.timeZone ?? this.timeZone
      : this.timeZone;
    const date = toCalendarDate(reference);
    return timestamp(
      new TZDate(date.year, date.month - 1, date.day, hour, minute, 0, 0, zone),
    );
  }

  /**
   * Hours keep the time of day; coarser units resolve to a date.
   * Null when the result falls outside the storable years.
   */
  private shift(
    reference: Moment,
    unit: DeltaUnit,
    amount: number,
  ): Moment | null {
    if (!Number.isSafeInteger(amount)) return null;
    if (unit === "hour") {
      const base = reference.kind === "datetime"
        ? reference.at
        : startOfDayIn(reference, this.timeZone).at;
      const at = addHours(base, amount);
      return isStorableDate(at) ? timestamp(at) : null;
    }
    const base = reference.kind === "datetime"
      ? reference.at
      : dateToUtc(reference);
    const shifted = addCalendarUnits(base, unit, amount);
    return isStorableDate(shifted) ? dateOf(shifted) : null;
  }
}

function addCalendarUnits(
  date: TZDate,
  unit: Exclude<DeltaUnit, "hour">,
  amount: number,
): TZDate {
  switch (unit) {
    case "day":
      return addDays(date, amount);
    case "week":
      return addWeeks(date, amount);
    case "month":
      return addMonths(date, amount);
    case "year":
      return addYears(date, amount);
    case "business day":
      // Zero business days from a weekend is the next business day
      if (amount === 0 && isWeekend(date)) return nextMonday(date);
      return addBusinessDays(date, amount);
  }
}

function parseDeltaUnit(value: string): DeltaUnit {
  const unit = DELTA_UNITS.find((u) => u === value);
  if (!unit) {
    throw new NbError("unrecognized_expression", `Unknown time unit: ${value}`);
  }
  return unit;
}

function weekdayOffset(name: string): number {
  return WEEKDAYS.findIndex((day) => day === name);
}
