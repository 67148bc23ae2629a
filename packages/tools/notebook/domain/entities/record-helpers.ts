// Record helpers - id resolution and listing order

import { NbError } from "./errors.ts";
import { compareMoments, type Moment } from "./moment.ts";
import { type NoteRecord, RECORD_TYPES, type RecordFile } from "./record.ts";

/**
 * Resolve an id or id prefix to a single record file.
 * Exact ids win over prefixes. Throws if no match or ambiguous.
 */
export function resolveRecordId(
  idOrPrefix: string,
  files: readonly RecordFile[],
): RecordFile {
  const wanted = idOrPrefix.toLowerCase();
  const exact = files.filter((f) => f.id === wanted);
  const matches = exact.length > 0
    ? exact
    : files.filter((f) => f.id.startsWith(wanted));

  if (matches.length === 0) {
    throw new NbError(
      "record_not_found",
      `No record found matching id: ${idOrPrefix}`,
    );
  }

  if (matches.length > 1) {
    throw new NbError(
      "ambiguous_record_id",
      `Ambiguous id '${idOrPrefix}' matches ${matches.length} records: ${
        matches.slice(0, 5).map((f) => f.filename).join(", ")
      }${matches.length > 5 ? "..." : ""}`,
    );
  }

  return matches[0];
}

/** Ascending order with missing values last. */
function compareOptional(a: Moment | null, b: Moment | null): number {
  if (a === null && b === null) return 0;
  if (a === null) return 1;
  if (b === null) return -1;
  return compareMoments(a, b);
}

/** Order within one record type. */
function compareWithinType(a: NoteRecord, b: NoteRecord): number {
  switch (a.type) {
    case "task":
    case "focus":
      return a.rankPriority - b.rankPriority ||
        compareOptional(a.due, b.due) ||
        compareOptional(a.created, b.created);
    case "due-date":
      return compareOptional(a.due, b.due);
    case "prediction":
      return compareOptional(a.expectedCompletion, b.expectedCompletion);
    case "note":
    case "gist":
    case "event":
    case "metric":
      // Newest first, undated last
      if (a.created === null || b.created === null) {
        return compareOptional(a.created, b.created);
      }
      return compareMoments(b.created, a.created);
  }
}

/**
 * Listing order: grouped by type (in RECORD_TYPES order), then by the
 * type's own key, then by file name so equal keys stay stable.
 */
export function compareRecords(a: NoteRecord, b: NoteRecord): number {
  return RECORD_TYPES.indexOf(a.type) - RECORD_TYPES.indexOf(b.type) ||
    compareWithinType(a, b) ||
    a.filename.localeCompare(b.filename);
}
