import { expect, test } from "vitest";
import { NbError } from "./errors.ts";
import { calendarDate, type Moment } from "./moment.ts";
import type { NoteRecord, RecordFile, RecordType } from "./record.ts";
import { compareRecords, resolveRecordId } from "./record-helpers.ts";

const files: RecordFile[] = [
  { id: "abc1230000", path: "/data/a-task.yaml", filename: "a-task.yaml" },
  { id: "abc4560000", path: "/data/b-task.yaml", filename: "b-task.yaml" },
  { id: "abc", path: "/data/c-task.yaml", filename: "c-task.yaml" },
  { id: "fff0000000", path: "/data/d-note.md", filename: "d-note.md" },
];

function makeRecord(
  filename: string,
  type: RecordType,
  fields: {
    created?: Moment;
    due?: Moment;
    expectedCompletion?: Moment;
    rankPriority?: number;
  } = {},
): NoteRecord {
  return {
    id: filename,
    type,
    format: "yaml",
    path: `/data/${filename}`,
    filename,
    event: filename,
    created: fields.created ?? null,
    expectedCompletion: fields.expectedCompletion ?? null,
    due: fields.due ?? null,
    irrelevantAfter: null,
    irrelevantBefore: null,
    stillRelevant: true,
    completed: null,
    completedAt: null,
    tags: [],
    rankPriority: fields.rankPriority ?? 10000,
    previousDueDates: [],
    raw: {},
  };
}

function sortedNames(records: NoteRecord[]): string[] {
  return [...records].sort(compareRecords).map((r) => r.filename);
}

test("resolveRecordId - unique prefix", () => {
  expect(resolveRecordId("abc4", files).filename).toBe("b-task.yaml");
  expect(resolveRecordId("FFF", files).filename).toBe("d-note.md");
});

test("resolveRecordId - exact id wins over longer ids sharing the prefix", () => {
  expect(resolveRecordId("abc", files).filename).toBe("c-task.yaml");
});

test("resolveRecordId - no match", () => {
  expect(() => resolveRecordId("999", files)).toThrow(
    new NbError("record_not_found", "No record found matching id: 999"),
  );
});

test("resolveRecordId - ambiguous prefix", () => {
  try {
    resolveRecordId("ab", files);
    expect.unreachable();
  } catch (e) {
    expect(e).toBeInstanceOf(NbError);
    if (e instanceof NbError) {
      expect(e.code).toBe("ambiguous_record_id");
      expect(e.message).toBe(
        "Ambiguous id 'ab' matches 3 records: a-task.yaml, b-task.yaml, c-task.yaml",
      );
    }
  }
});

test("compareRecords - groups by type before anything else", () => {
  expect(sortedNames([
    makeRecord("n.md", "note", { created: calendarDate(2022, 5, 1) }),
    makeRecord("p.yaml", "prediction"),
    makeRecord("t.yaml", "task"),
    makeRecord("d.yaml", "due-date"),
  ])).toEqual(["t.yaml", "d.yaml", "p.yaml", "n.md"]);
});

test("compareRecords - tasks by rank, then due with undated last", () => {
  expect(sortedNames([
    makeRecord("late.yaml", "task", { due: calendarDate(2022, 6, 1) }),
    makeRecord("undated.yaml", "task"),
    makeRecord("soon.yaml", "task", { due: calendarDate(2022, 5, 10) }),
    makeRecord("ranked.yaml", "task", {
      rankPriority: 5,
      due: calendarDate(2022, 9, 1),
    }),
  ])).toEqual(["ranked.yaml", "soon.yaml", "late.yaml", "undated.yaml"]);
});

test("compareRecords - predictions by expected completion", () => {
  expect(sortedNames([
    makeRecord("b.yaml", "prediction", {
      expectedCompletion: calendarDate(2022, 8, 1),
    }),
    makeRecord("a.yaml", "prediction", {
      expectedCompletion: calendarDate(2022, 7, 1),
    }),
  ])).toEqual(["a.yaml", "b.yaml"]);
});

test("compareRecords - notes newest first, undated last", () => {
  expect(sortedNames([
    makeRecord("old.md", "note", { created: calendarDate(2022, 1, 1) }),
    makeRecord("undated.md", "note"),
    makeRecord("new.md", "note", { created: calendarDate(2022, 5, 1) }),
  ])).toEqual(["new.md", "old.md", "undated.md"]);
});

test("compareRecords - file name breaks ties", () => {
  expect(sortedNames([
    makeRecord("b.yaml", "due-date", { due: calendarDate(2022, 5, 1) }),
    makeRecord("a.yaml", "due-date", { due: calendarDate(2022, 5, 1) }),
  ])).toEqual(["a.yaml", "b.yaml"]);
});
