// Notebook types - entity re-exports shared by the CLI and the public module

export * from "./domain/entities/config.ts";
export * from "./domain/entities/errors.ts";
export * from "./domain/entities/moment.ts";
export * from "./domain/entities/outputs.ts";
export * from "./domain/entities/record.ts";
export * from "./domain/entities/record-helpers.ts";
