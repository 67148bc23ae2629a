/**
 * Adapter: CLI formatter
 *
 * Pure functions turning command outputs into the text printed by `nb`.
 * JSON output bypasses these and prints the output objects directly.
 */

import type { NbError } from "../../domain/entities/errors.ts";
import {
  formatMoment,
  type Moment,
  serializeMoment,
} from "../../domain/entities/moment.ts";
import type {
  CompleteOutput,
  CreateOutput,
  ListOutput,
  ParseFailure,
  PushOutput,
  ShowOutput,
} from "../../domain/entities/outputs.ts";
import {
  DEFAULT_RANK_PRIORITY,
  type NoteRecord,
} from "../../domain/entities/record.ts";

const COLUMN_GAP = "  ";

function stored(moment: Moment | null): string | null {
  return moment ? serializeMoment(moment) : null;
}

/** JSON view of a record: moments in their storage form, raw mapping left out. */
export function recordToJson(record: NoteRecord): Record<string, unknown> {
  return {
    id: record.id,
    type: record.type,
    format: record.format,
    path: record.path,
    filename: record.filename,
    event: record.event,
    created: stored(record.created),
    expected_completion: stored(record.expectedCompletion),
    due: stored(record.due),
    irrelevant_after: stored(record.irrelevantAfter),
    irrelevant_before: stored(record.irrelevantBefore),
    still_relevant: record.stillRelevant,
    completed: record.completed,
    completed_at: stored(record.completedAt),
    tags: record.tags,
    rank_priority: record.rankPriority,
    previous_due_dates: record.previousDueDates,
  };
}

/** The moment a listing shows for a record: the one it sorts by. */
export function displayMoment(record: NoteRecord): Moment | null {
  switch (record.type) {
    case "task":
    case "focus":
    case "due-date":
      return record.due;
    case "prediction":
      return record.expectedCompletion;
    case "note":
    case "gist":
    case "event":
    case "metric":
      return record.created;
  }
}

function padColumns(rows: readonly (readonly string[])[]): string[] {
  const widths: number[] = [];
  for (const row of rows) {
    row.forEach((cell, i) => {
      widths[i] = Math.max(widths[i] ?? 0, cell.length);
    });
  }
  return rows.map((row) =>
    row
      .map((cell, i) => (i === row.length - 1 ? cell : cell.padEnd(widths[i])))
      .join(COLUMN_GAP)
      .trimEnd()
  );
}

export function formatList(output: ListOutput, showAll = false): string {
  if (output.records.length === 0) {
    return showAll ? "no records" : "no active records";
  }

  const rows = output.records.map((r) => {
    const when = displayMoment(r);
    return [
      r.id,
      r.type,
      when ? formatMoment(when) : "-",
      r.completed ? `[x] ${r.event}` : r.event,
      r.tags.map((t) => `#${t}`).join(" "),
    ];
  });
  return padColumns(rows).join("\n");
}

export function formatFailure(failure: ParseFailure): string {
  return `Error parsing ${failure.path}: ${failure.message}`;
}

function line(label: string, value: Moment | null): string[] {
  return value ? [`${label}: ${formatMoment(value)}`] : [];
}

export function formatShow(output: ShowOutput): string {
  const r = output.record;
  const lines: string[] = [
    `id: ${r.id}`,
    `type: ${r.type}`,
    `file: ${r.path}`,
    `event: ${r.event}`,
    ...line("created", r.created),
    ...line("expected completion", r.expectedCompletion),
    ...line("due", r.due),
    ...line("irrelevant after", r.irrelevantAfter),
    ...line("irrelevant before", r.irrelevantBefore),
    `relevant: ${r.stillRelevant ? "yes" : "no"}`,
  ];
  if (r.completed !== null) {
    lines.push(`completed: ${r.completed ? "yes" : "no"}`);
  }
  lines.push(...line("completed at", r.completedAt));
  if (r.tags.length > 0) {
    lines.push(`tags: ${r.tags.join(", ")}`);
  }
  if (r.rankPriority !== DEFAULT_RANK_PRIORITY) {
    lines.push(`rank priority: ${r.rankPriority}`);
  }
  if (r.previousDueDates.length > 0) {
    lines.push("previous due dates:");
    for (const due of r.previousDueDates) {
      lines.push(`  ${due}`);
    }
  }
  return lines.join("\n");
}

export function formatComplete(output: CompleteOutput): string {
  switch (output.status) {
    case "completed":
      return `completed ${output.id}`;
    case "already_completed":
      return output.completedAt
        ? `${output.id} already completed at ${output.completedAt}`
        : `${output.id} already completed`;
  }
}

export function formatPush(output: PushOutput): string {
  return output.previousDue
    ? `${output.id} due ${output.previousDue} -> ${output.due}`
    : `${output.id} due ${output.due}`;
}

export function formatCreate(output: CreateOutput): string {
  return `Record saved to ${output.filename}`;
}

export function formatError(error: NbError): string {
  const text = `error: ${error.code}\n${error.message}`;
  return error.file ? `${text}\nfile: ${error.file}` : text;
}
