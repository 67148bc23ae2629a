// ParseRecordUseCase - Read one record file into a NoteRecord
// Extracts raw fields, resolves every date-valued key, derives relevance

import { z } from "zod/mini";
import { NbError } from "../entities/errors.ts";
import {
  addDaysTo,
  compareMoments,
  type Moment,
  readStoredMoment,
  toCalendarDate,
} from "../entities/moment.ts";
import {
  COPY_DUE,
  DEFAULT_RANK_PRIORITY,
  isRecordType,
  type NoteRecord,
  type RawRecord,
  type RecordFormat,
  type RecordType,
} from "../entities/record.ts";
import type { Clock } from "../ports/clock.ts";
import type { HashService } from "../ports/hash-service.ts";
import type { MarkdownService } from "../ports/markdown-service.ts";
import type { YamlService } from "../ports/yaml-service.ts";
import { MomentResolver } from "./resolve-moment.ts";

const DEFAULT_RELEVANCE_DAYS = 365;

// Leading "<ISO timestamp>-" of a record file stem
const TYPED_STEM = /^[0-9][0-9T:.+-]*-(.+)$/;

const RawFieldsSchema = z.object({
  event: z.optional(z.nullable(z.string())),
  tags: z.optional(z.nullable(z.array(z.string()))),
  rank_priority: z.optional(z.nullable(z.int())),
  completed: z.optional(z.nullable(z.boolean())),
  previous_due_dates: z.optional(z.nullable(z.array(z.string()))),
});

export interface ParseRecordInput {
  readonly content: string;
  readonly filename: string;
  readonly path?: string;
}

export interface ParseRecordDeps {
  readonly yamlService: YamlService;
  readonly markdownService: MarkdownService;
  readonly hashService: HashService;
  readonly clock: Clock;
  readonly timeZone: string;
}

/** Format of a record file, from its extension. */
export function recordFormatOf(filename: string): RecordFormat {
  const dot = filename.lastIndexOf(".");
  const ext = dot === -1 ? "" : filename.slice(dot).toLowerCase();
  switch (ext) {
    case ".yaml":
    case ".yml":
      return "yaml";
    case ".md":
      return "markdown";
    default:
      throw new NbError(
        "unknown_extension",
        `Unknown file type: ${ext || "(none)"}`,
        filename,
      );
  }
}

/** Record type from a `<timestamp>-<type>.<ext>` file name. */
export function recordTypeOf(filename: string): RecordType {
  const dot = filename.lastIndexOf(".");
  const stem = dot === -1 ? filename : filename.slice(0, dot);
  const match = stem.match(TYPED_STEM);
  if (!match) {
    throw new NbError(
      "malformed_record",
      `File name does not match <timestamp>-<type>: ${filename}`,
      filename,
    );
  }
  const type = match[1];
  if (!isRecordType(type)) {
    throw new NbError(
      "malformed_record",
      `Unknown record type '${type}' in file name: ${filename}`,
      filename,
    );
  }
  return type;
}

function isMapping(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export class ParseRecordUseCase {
  private readonly resolver: MomentResolver;

  constructor(private readonly deps: ParseRecordDeps) {
    this.resolver = new MomentResolver(deps.timeZone);
  }

  async execute(input: ParseRecordInput): Promise<NoteRecord> {
    const path = input.path ?? input.filename;
    try {
      return await this.parse(input, path);
    } catch (e) {
      if (e instanceof NbError && !e.file) {
        throw e.withFile(path);
      }
      throw e;
    }
  }

  private async parse(input: ParseRecordInput, path: string): Promise<NoteRecord> {
    const format = recordFormatOf(input.filename);
    const type = recordTypeOf(input.filename);
    const { event, raw } = this.extract(input.content, format);
    const fields = RawFieldsSchema.safeParse(raw);
    if (!fields.success) {
      const details = fields.error.issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join("; ");
      throw new NbError("malformed_record", `Invalid record fields: ${details}`);
    }

    const now = this.deps.clock.now();
    const today = toCalendarDate(now);

    const created = this.readCreated(raw);
    const base = created ?? today;
    const expectedCompletion = this.resolveField(
      raw,
      "expected_completion",
      base,
    );
    const due = this.resolveField(raw, "due", base);
    const anchor = expectedCompletion ?? due ?? created ?? today;

    const irrelevantAfter = this.hasValue(raw, "irrelevant_after")
      ? this.resolveBoundary(raw, "irrelevant_after", anchor, due)
      : created
      ? addDaysTo(created, DEFAULT_RELEVANCE_DAYS)
      : null;
    const irrelevantBefore = this.hasValue(raw, "irrelevant_before")
      ? this.resolveBoundary(raw, "irrelevant_before", anchor, due)
      : null;

    const stillRelevant =
      (irrelevantAfter === null || compareMoments(now, irrelevantAfter) <= 0) &&
      (irrelevantBefore === null || compareMoments(irrelevantBefore, now) <= 0);

    return {
      id: await this.deps.hashService.fileId(input.filename),
      type,
      format,
      path,
      filename: input.filename,
      event,
      created,
      expectedCompletion,
      due,
      irrelevantAfter,
      irrelevantBefore,
      stillRelevant,
      completed: fields.data.completed ?? null,
      completedAt: this.resolveField(raw, "completed_at", anchor),
      tags: fields.data.tags ?? [],
      rankPriority: fields.data.rank_priority ?? DEFAULT_RANK_PRIORITY,
      previousDueDates: fields.data.previous_due_dates ?? [],
      raw,
    };
  }

  /** Pull the title and the raw mapping out of the file content. */
  private extract(
    content: string,
    format: RecordFormat,
  ): { event: string; raw: RawRecord } {
    switch (format) {
      case "markdown": {
        const outline = this.deps.markdownService.outline(content);
        const heading = outline.headings.find((h) => h.level === 1);
        if (!heading) {
          throw new NbError("malformed_record", "Missing level-1 heading");
        }
        const block = outline.codeBlocks.findLast((b) => b.info === "yaml");
        if (!block) {
          throw new NbError("malformed_record", "Missing yaml code block");
        }
        return { event: heading.title, raw: this.loadMapping(block.literal) };
      }
      case "yaml": {
        const raw = this.loadMapping(content);
        const event = raw["event"];
        if (event === undefined || event === null) {
          throw new NbError("malformed_record", "Missing required key: event");
        }
        if (typeof event !== "string") {
          throw new NbError("malformed_record", "Key 'event' must be a string");
        }
        return { event, raw };
      }
    }
  }

  private loadMapping(yaml: string): RawRecord {
    let value: unknown;
    try {
      value = this.deps.yamlService.parse(yaml);
    } catch (e) {
      const reason = e instanceof Error ? e.message : String(e);
      throw new NbError("malformed_record", `Invalid YAML: ${reason}`);
    }
    if (!isMapping(value)) {
      throw new NbError("malformed_record", "Record content is not a mapping");
    }
    return value;
  }

  private hasValue(raw: RawRecord, key: string): boolean {
    const value = raw[key];
    return value !== undefined && value !== null && value !== "";
  }

  private readCreated(raw: RawRecord): Moment | null {
    const key = this.hasValue(raw, "date") ? "date" : "timestamp";
    const value = raw[key];
    if (value === undefined || value === null || value === "") return null;
    const moment = typeof value === "string"
      ? readStoredMoment(value, this.deps.timeZone)
      : null;
    if (!moment) {
      throw new NbError(
        "malformed_record",
        `Key '${key}' is not an ISO date or timestamp: ${String(value)}`,
      );
    }
    return moment;
  }

  /** Resolve one stored value: a concrete ISO value, else an expression. */
  private resolveField(
    raw: RawRecord,
    key: string,
    reference: Moment,
  ): Moment | null {
    const value = raw[key];
    if (value === undefined || value === null || value === "") return null;
    if (typeof value !== "string") {
      throw new NbError(
        "malformed_record",
        `Key '${key}' must be a date expression, got: ${String(value)}`,
      );
    }
    try {
      return this.resolver.resolveStored(value, reference);
    } catch (e) {
      if (e instanceof NbError) {
        throw new NbError(e.code, `${key}: ${e.message}`);
      }
      throw e;
    }
  }

  private resolveBoundary(
    raw: RawRecord,
    key: string,
    anchor: Moment,
    due: Moment | null,
  ): Moment | null {
    if (raw[key] === COPY_DUE) return due;
    return this.resolveField(raw, key, anchor);
  }
}
