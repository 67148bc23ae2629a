// Record entity - core domain type for notebook records

import type { Moment } from "./moment.ts";

export type RecordType =
  | "task"
  | "due-date"
  | "focus"
  | "prediction"
  | "note"
  | "gist"
  | "event"
  | "metric";

export const RECORD_TYPES = [
  "task",
  "due-date",
  "focus",
  "prediction",
  "note",
  "gist",
  "event",
  "metric",
] as const;

export function isRecordType(value: string): value is RecordType {
  const types: readonly string[] = RECORD_TYPES;
  return types.includes(value);
}

export type RecordFormat = "yaml" | "markdown";

export const RECORD_FORMAT_EXTENSIONS: Readonly<
  Record<RecordFormat, string>
> = {
  yaml: "yaml",
  markdown: "md",
};

export const DEFAULT_RANK_PRIORITY = 10000;

/** Marker for `irrelevant_*` keys that copy the resolved due date. */
export const COPY_DUE = "==due";

/**
 * The key/value mapping stored in a record file, as loaded.
 * Rewritten whole on mutation so unknown keys survive.
 */
export type RawRecord = Readonly<Record<string, unknown>>;

/**
 * Immutable record parsed from one file.
 */
export type NoteRecord = {
  readonly id: string; // short digest of the file name
  readonly type: RecordType;
  readonly format: RecordFormat;
  readonly path: string;
  readonly filename: string;
  readonly event: string;
  readonly created: Moment | null;
  readonly expectedCompletion: Moment | null;
  readonly due: Moment | null;
  readonly irrelevantAfter: Moment | null;
  readonly irrelevantBefore: Moment | null;
  readonly stillRelevant: boolean;
  readonly completed: boolean | null;
  readonly completedAt: Moment | null;
  readonly tags: readonly string[];
  readonly rankPriority: number;
  readonly previousDueDates: readonly string[];
  readonly raw: RawRecord;
};

/**
 * Location of a record file, before it is parsed.
 */
export type RecordFile = {
  readonly id: string;
  readonly path: string;
  readonly filename: string;
};
