// CompleteRecordUseCase - Mark a record completed
// Only `completed` and `completed_at` change; every other key is written back as loaded

import type { CompleteOutput } from "../entities/outputs.ts";
import { serializeMoment } from "../entities/moment.ts";
import type { Clock } from "../ports/clock.ts";
import type { MarkdownService } from "../ports/markdown-service.ts";
import type { RecordRepository } from "../ports/record-repository.ts";
import type { YamlService } from "../ports/yaml-service.ts";
import type { FindRecordUseCase } from "./find-record.ts";
import { rewriteRecord } from "./rewrite-record.ts";

export interface CompleteRecordInput {
  readonly id: string;
}

export interface CompleteRecordDeps {
  readonly finder: FindRecordUseCase;
  readonly recordRepo: RecordRepository;
  readonly yamlService: YamlService;
  readonly markdownService: MarkdownService;
  readonly clock: Clock;
}

export class CompleteRecordUseCase {
  constructor(private readonly deps: CompleteRecordDeps) {}

  async execute(input: CompleteRecordInput): Promise<CompleteOutput> {
    const { file, content, record } = await this.deps.finder.execute(input.id);

    if (record.completed) {
      return {
        status: "already_completed",
        id: record.id,
        completedAt: record.completedAt
          ? serializeMoment(record.completedAt)
          : null,
      };
    }

    const completedAt = serializeMoment(this.deps.clock.now());
    const raw = { ...record.raw, completed: true, completed_at: completedAt };
    await this.deps.recordRepo.saveContent(
      file.path,
      rewriteRecord(this.deps, content, record.format, raw),
    );

    return { status: "completed", id: record.id, completedAt };
  }
}
