// Command output types - immutable result types for notebook commands

import type { Moment } from "./moment.ts";
import type { NoteRecord } from "./record.ts";

export type ParseFailure = {
  readonly path: string;
  readonly message: string;
};

export type ListOutput = {
  readonly records: readonly NoteRecord[];
  readonly failures: readonly ParseFailure[];
};

export type CompleteOutput = {
  readonly status: "completed" | "already_completed";
  readonly id: string;
  readonly completedAt: string | null;
};

export type PushOutput = {
  readonly id: string;
  readonly previousDue: string | null;
  readonly due: string;
};

export type CreateOutput = {
  readonly id: string;
  readonly filename: string;
};

export type ShowOutput = {
  readonly record: NoteRecord;
};

export type ResolveOutput = {
  readonly expression: string;
  readonly kind: Moment["kind"];
  readonly value: string; // storage form
  readonly display: string;
};
