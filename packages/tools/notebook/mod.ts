// Main module exports for notebook

// ============================================================================
// Domain entities
// ============================================================================

export * from "./types.ts";

// ============================================================================
// Domain ports (interfaces)
// ============================================================================

export type { Clock } from "./domain/ports/clock.ts";
export type { Editor } from "./domain/ports/editor.ts";
export type { FileSystem } from "./domain/ports/filesystem.ts";
export type { HashService } from "./domain/ports/hash-service.ts";
export type {
  CodeBlock,
  Heading,
  MarkdownOutline,
  MarkdownService,
} from "./domain/ports/markdown-service.ts";
export type { RecordRepository } from "./domain/ports/record-repository.ts";
export type {
  RecordTemplate,
  TemplateRepository,
} from "./domain/ports/template-repository.ts";
export type { YamlService } from "./domain/ports/yaml-service.ts";

// ============================================================================
// Use cases
// ============================================================================

export {
  DELTA_UNITS,
  type DeltaUnit,
  type MomentExpression,
  MomentResolver,
  WEEKDAYS,
} from "./domain/use-cases/resolve-moment.ts";
export {
  type ParseRecordInput,
  ParseRecordUseCase,
  recordFormatOf,
  recordTypeOf,
} from "./domain/use-cases/parse-record.ts";
export {
  type ListRecordsInput,
  ListRecordsUseCase,
} from "./domain/use-cases/list-records.ts";
export {
  FindRecordUseCase,
  type FoundRecord,
} from "./domain/use-cases/find-record.ts";
export { CompleteRecordUseCase } from "./domain/use-cases/complete-record.ts";
export { PushDueUseCase } from "./domain/use-cases/push-due.ts";
export { CreateRecordUseCase } from "./domain/use-cases/create-record.ts";
export { EditRecordUseCase } from "./domain/use-cases/edit-record.ts";

// ============================================================================
// Adapters
// ============================================================================

export { loadConfig } from "./adapters/config/env-config.ts";
export { SystemClock } from "./adapters/clock/system-clock.ts";
export { NodeFileSystem } from "./adapters/filesystem/node-fs.ts";
export { InMemoryFileSystem } from "./adapters/filesystem/in-memory-fs.ts";
export { OutlineMarkdownService } from "./adapters/markdown/outline-parser.ts";
export { FileRecordRepository } from "./adapters/repositories/file-record-repo.ts";
export { FileTemplateRepository } from "./adapters/repositories/file-template-repo.ts";
export { Blake2HashService } from "./adapters/services/blake2-hash.ts";
export { JsYamlService } from "./adapters/services/js-yaml-service.ts";
export { SpawnEditor } from "./adapters/editor/spawn-editor.ts";
