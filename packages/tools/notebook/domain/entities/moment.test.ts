import { TZDate } from "@date-fns/tz";
import { expect, test } from "vitest";
import {
  addDaysTo,
  calendarDate,
  compareMoments,
  formatMoment,
  NEVER,
  readStoredMoment,
  serializeMoment,
  timestamp,
  tryCalendarDate,
  weekdayIndex,
} from "./moment.ts";

const TZ = "America/Los_Angeles";

function at(
  year: number,
  month: number,
  day: number,
  hour = 0,
  minute = 0,
) {
  return timestamp(new TZDate(year, month - 1, day, hour, minute, 0, 0, TZ));
}

test("tryCalendarDate - rejects days the month does not have", () => {
  expect(tryCalendarDate(2022, 2, 30)).toBeNull();
  expect(tryCalendarDate(2023, 2, 29)).toBeNull();
  expect(tryCalendarDate(2022, 13, 1)).toBeNull();
  expect(tryCalendarDate(2024, 2, 29)).toEqual(calendarDate(2024, 2, 29));
});

test("weekdayIndex - counts from Monday", () => {
  expect(weekdayIndex(calendarDate(2022, 5, 2))).toBe(0);
  expect(weekdayIndex(calendarDate(2022, 5, 3))).toBe(1);
  expect(weekdayIndex(calendarDate(2022, 5, 8))).toBe(6);
});

test("addDaysTo - keeps the kind of the moment", () => {
  expect(addDaysTo(calendarDate(2022, 12, 31), 365)).toEqual(
    calendarDate(2023, 12, 31),
  );
  expect(serializeMoment(addDaysTo(at(2022, 5, 3, 10), 1))).toBe(
    "2022-05-04T10:00:00-07:00",
  );
});

test("compareMoments - orders timestamps by instant", () => {
  expect(compareMoments(at(2022, 5, 3, 9), at(2022, 5, 3, 10))).toBe(-1);
  expect(compareMoments(at(2022, 5, 3, 10), at(2022, 5, 3, 9))).toBe(1);
  expect(compareMoments(at(2022, 5, 3, 10), at(2022, 5, 3, 10))).toBe(0);
});

test("compareMoments - truncates to the day when one side is a date", () => {
  const day = calendarDate(2022, 5, 3);
  expect(compareMoments(day, at(2022, 5, 3, 23, 30))).toBe(0);
  expect(compareMoments(at(2022, 5, 3, 0, 5), day)).toBe(0);
  expect(compareMoments(day, at(2022, 5, 4, 0, 0))).toBe(-1);
  expect(compareMoments(calendarDate(2022, 5, 4), day)).toBe(1);
});

test("formatMoment - short display forms", () => {
  expect(formatMoment(calendarDate(2022, 5, 3))).toBe("2022-05-03");
  expect(formatMoment(at(2022, 5, 3, 14, 30))).toBe("2022-05-03 14:30");
  expect(formatMoment(NEVER)).toBe("2100-01-01");
});

test("serializeMoment - ISO with the zone offset", () => {
  expect(serializeMoment(at(2022, 1, 15, 8))).toBe("2022-01-15T08:00:00-08:00");
  expect(serializeMoment(at(2022, 7, 15, 8))).toBe("2022-07-15T08:00:00-07:00");
});

test("readStoredMoment - date only", () => {
  expect(readStoredMoment("2022-05-03", TZ)).toEqual(calendarDate(2022, 5, 3));
});

test("readStoredMoment - keeps the instant of an offset timestamp", () => {
  const moment = readStoredMoment("2022-05-03T10:00:00-07:00", TZ);
  expect(moment && serializeMoment(moment)).toBe("2022-05-03T10:00:00-07:00");

  const shifted = readStoredMoment("2022-05-03T10:00:00+02:00", TZ);
  expect(shifted && serializeMoment(shifted)).toBe("2022-05-03T01:00:00-07:00");
});

test("readStoredMoment - reads timestamps without offset as UTC", () => {
  const naive = readStoredMoment("2022-05-03 17:00:00", TZ);
  expect(naive && serializeMoment(naive)).toBe("2022-05-03T10:00:00-07:00");

  const zulu = readStoredMoment("2022-05-03T17:00:00Z", TZ);
  expect(zulu && serializeMoment(zulu)).toBe("2022-05-03T10:00:00-07:00");
});

test("readStoredMoment - fractional seconds", () => {
  const moment = readStoredMoment("2022-05-03T10:00:00.250-07:00", TZ);
  expect(moment?.kind).toBe("datetime");
  if (moment?.kind === "datetime") {
    expect(moment.at.getMilliseconds()).toBe(250);
  }
});

test("readStoredMoment - null for anything else", () => {
  expect(readStoredMoment("next friday", TZ)).toBeNull();
  expect(readStoredMoment("2022-02-30", TZ)).toBeNull();
  expect(readStoredMoment("2022-05-03T25:00:00", TZ)).toBeNull();
  expect(readStoredMoment("", TZ)).toBeNull();
});
