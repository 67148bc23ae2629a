import { TZDate } from "@date-fns/tz";
import { expect, test } from "vitest";
import { NbError } from "../../domain/entities/errors.ts";
import { calendarDate, type Moment, timestamp } from "../../domain/entities/moment.ts";
import type { NoteRecord, RecordType } from "../../domain/entities/record.ts";
import {
  formatComplete,
  formatError,
  formatFailure,
  formatList,
  formatPush,
  formatShow,
  recordToJson,
} from "./formatter.ts";

const TZ = "America/Los_Angeles";

function makeRecord(
  id: string,
  type: RecordType,
  event: string,
  fields: Partial<{
    created: Moment;
    due: Moment;
    expectedCompletion: Moment;
    completed: boolean;
    tags: string[];
  }> = {},
): NoteRecord {
  return {
    id,
    type,
    format: "yaml",
    path: `/data/${id}.yaml`,
    filename: `${id}.yaml`,
    event,
    created: fields.created ?? null,
    expectedCompletion: fields.expectedCompletion ?? null,
    due: fields.due ?? null,
    irrelevantAfter: null,
    irrelevantBefore: null,
    stillRelevant: true,
    completed: fields.completed ?? null,
    completedAt: null,
    tags: fields.tags ?? [],
    rankPriority: 10000,
    previousDueDates: [],
    raw: {},
  };
}

test("formatList - aligned columns showing each type's key date", () => {
  const output = {
    records: [
      makeRecord("aaaaaaaaaa", "task", "Write report", {
        due: calendarDate(2022, 5, 6),
        tags: ["work", "q2"],
      }),
      makeRecord("bbbbbbbbbb", "prediction", "Ship", {
        expectedCompletion: calendarDate(2022, 6, 1),
      }),
      makeRecord("cccccccccc", "note", "Standup", {
        created: timestamp(new TZDate(2022, 4, 4, 9, 30, 0, 0, TZ)),
        completed: true,
      }),
      makeRecord("dddddddddd", "task", "Someday"),
    ],
    failures: [],
  };

  expect(formatList(output)).toBe(
    [
      "aaaaaaaaaa  task        2022-05-06        Write report  #work #q2",
      "bbbbbbbbbb  prediction  2022-06-01        Ship",
      "cccccccccc  note        2022-05-04 09:30  [x] Standup",
      "dddddddddd  task        -                 Someday",
    ].join("\n"),
  );
});

test("formatList - empty listings", () => {
  expect(formatList({ records: [], failures: [] })).toBe("no active records");
  expect(formatList({ records: [], failures: [] }, true)).toBe("no records");
});

test("formatShow - only the fields the record has", () => {
  const record = makeRecord("aaaaaaaaaa", "task", "Write report", {
    created: calendarDate(2022, 5, 3),
    due: calendarDate(2022, 5, 6),
    tags: ["work"],
  });
  expect(formatShow({ record })).toBe(
    [
      "id: aaaaaaaaaa",
      "type: task",
      "file: /data/aaaaaaaaaa.yaml",
      "event: Write report",
      "created: 2022-05-03",
      "due: 2022-05-06",
      "relevant: yes",
      "tags: work",
    ].join("\n"),
  );
});

test("recordToJson - moments in storage form", () => {
  const record = makeRecord("aaaaaaaaaa", "event", "Lunch", {
    created: timestamp(new TZDate(2022, 4, 3, 12, 0, 0, 0, TZ)),
  });
  expect(recordToJson(record)).toMatchObject({
    id: "aaaaaaaaaa",
    created: "2022-05-03T12:00:00-07:00",
    due: null,
    still_relevant: true,
    tags: [],
  });
});

test("formatComplete / formatPush - one-line summaries", () => {
  expect(
    formatComplete({ status: "completed", id: "abc", completedAt: "2022-05-10" }),
  ).toBe("completed abc");
  expect(
    formatComplete({
      status: "already_completed",
      id: "abc",
      completedAt: "2022-05-04T08:00:00-07:00",
    }),
  ).toBe("abc already completed at 2022-05-04T08:00:00-07:00");
  expect(formatPush({ id: "abc", previousDue: "2022-05-06", due: "2022-05-20" }))
    .toBe("abc due 2022-05-06 -> 2022-05-20");
  expect(formatPush({ id: "abc", previousDue: null, due: "2022-05-20" })).toBe(
    "abc due 2022-05-20",
  );
});

test("formatFailure / formatError", () => {
  expect(formatFailure({ path: "/data/x.yaml", message: "malformed_record: bad" }))
    .toBe("Error parsing /data/x.yaml: malformed_record: bad");
  expect(formatError(new NbError("record_not_found", "No record found matching id: zz")))
    .toBe("error: record_not_found\nNo record found matching id: zz");
  expect(formatError(new NbError("malformed_record", "Missing yaml code block", "/data/n.md")))
    .toBe("error: malformed_record\nMissing yaml code block\nfile: /data/n.md");
});
