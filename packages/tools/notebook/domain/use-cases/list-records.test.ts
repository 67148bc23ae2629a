import { TZDate } from "@date-fns/tz";
import { beforeEach, expect, test } from "vitest";
import { InMemoryFileSystem } from "../../adapters/filesystem/in-memory-fs.ts";
import { OutlineMarkdownService } from "../../adapters/markdown/outline-parser.ts";
import { FileRecordRepository } from "../../adapters/repositories/file-record-repo.ts";
import { Blake2HashService } from "../../adapters/services/blake2-hash.ts";
import { JsYamlService } from "../../adapters/services/js-yaml-service.ts";
import { timestamp } from "../entities/moment.ts";
import { ListRecordsUseCase } from "./list-records.ts";
import { ParseRecordUseCase } from "./parse-record.ts";

const TZ = "America/Los_Angeles";
const DATA_DIR = "/notes/data";

const FILES: Record<string, string> = {
  "2022-05-01T09:00:00-07:00-task.yaml":
    "event: Low priority\ndate: 2022-05-01T09:00:00-07:00\ndue: 2022-05-20\n",
  "2022-05-02T09:00:00-07:00-task.yaml":
    "event: Urgent\ndate: 2022-05-02T09:00:00-07:00\ndue: 2022-05-30\nrank_priority: 1\ntags: [work]\n",
  "2022-05-03T09:00:00-07:00-task.yaml":
    "event: Done already\ndate: 2022-05-03T09:00:00-07:00\ncompleted: true\n",
  "2022-05-04T09:00:00-07:00-note.md":
    "# Old note\n\n```yaml\ndate: 2022-05-04\nirrelevant_after: 2022-05-05\n```\n",
  "2022-05-05T09:00:00-07:00-note.md":
    "# Fresh note\n\n```yaml\ndate: 2022-05-05\ntags: [work]\n```\n",
  "2022-05-06T09:00:00-07:00-note.yaml":
    "event: Newer note\ndate: 2022-05-06\n",
  "2022-05-07T09:00:00-07:00-prediction.yaml":
    "event: Ship v1\ndate: 2022-05-07\nexpected_completion: 2 weeks\n",
  "2022-05-08T09:00:00-07:00-task.yaml": "due: tomorrow\n",
  ".2022-05-09T09:00:00-07:00-task.yaml.swp": "not a record",
};

let fs: InMemoryFileSystem;
let listRecords: ListRecordsUseCase;

beforeEach(() => {
  fs = new InMemoryFileSystem(
    Object.fromEntries(
      Object.entries(FILES).map(([name, content]) => [
        `${DATA_DIR}/${name}`,
        content,
      ]),
    ),
  );
  const hashService = new Blake2HashService();
  const parser = new ParseRecordUseCase({
    yamlService: new JsYamlService(),
    markdownService: new OutlineMarkdownService(),
    hashService,
    clock: { now: () => timestamp(new TZDate(2022, 4, 10, 12, 0, 0, 0, TZ)) },
    timeZone: TZ,
  });
  listRecords = new ListRecordsUseCase({
    recordRepo: new FileRecordRepository(fs, hashService, DATA_DIR),
    parser,
    concurrency: 3,
  });
});

test("ListRecords - active records of every type, in listing order", async () => {
  const output = await listRecords.execute({ showAll: false });
  expect(output.records.map((r) => r.event)).toEqual([
    "Urgent",
    "Low priority",
    "Ship v1",
    "Newer note",
    "Fresh note",
  ]);
});

test("ListRecords - one malformed file is reported, the rest still list", async () => {
  const output = await listRecords.execute({ showAll: true });
  expect(output.records).toHaveLength(7);
  expect(output.failures).toEqual([
    {
      path: `${DATA_DIR}/2022-05-08T09:00:00-07:00-task.yaml`,
      message: "malformed_record: Missing required key: event",
    },
  ]);
});

test("ListRecords - an out-of-range offset fails only its own file", async () => {
  fs.setFile(
    `${DATA_DIR}/2022-05-09T09:00:00-07:00-task.yaml`,
    "event: Far away\ndate: 2022-05-09\ndue: 99999999999 hours\n",
  );

  const output = await listRecords.execute({ types: ["task"], showAll: false });

  expect(output.records.map((r) => r.event)).toEqual([
    "Urgent",
    "Low priority",
  ]);
  expect(output.failures).toEqual([
    {
      path: `${DATA_DIR}/2022-05-08T09:00:00-07:00-task.yaml`,
      message: "malformed_record: Missing required key: event",
    },
    {
      path: `${DATA_DIR}/2022-05-09T09:00:00-07:00-task.yaml`,
      message:
        "unrecognized_expression: due: Unrecognized temporal expression: 99999999999 hours",
    },
  ]);
});

test("ListRecords - type filter with --all includes completed records", async () => {
  const output = await listRecords.execute({ types: ["task"], showAll: true });
  expect(output.records.map((r) => r.event)).toEqual([
    "Urgent",
    "Low priority",
    "Done already",
  ]);
  expect(output.failures).toHaveLength(1);
});

test("ListRecords - several types", async () => {
  const output = await listRecords.execute({
    types: ["note", "prediction"],
    showAll: true,
  });
  expect(output.records.map((r) => r.event)).toEqual([
    "Ship v1",
    "Newer note",
    "Fresh note",
    "Old note",
  ]);
  expect(output.failures).toEqual([]);
});

test("ListRecords - tag filter", async () => {
  const output = await listRecords.execute({ showAll: false, tag: "work" });
  expect(output.records.map((r) => r.event)).toEqual(["Urgent", "Fresh note"]);
});

test("ListRecords - empty data directory", async () => {
  const empty = await listRecords.execute({ types: ["metric"], showAll: true });
  expect(empty).toEqual({ records: [], failures: [] });
});
