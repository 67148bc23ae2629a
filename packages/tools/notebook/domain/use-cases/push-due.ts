// PushDueUseCase - Move a record's due date, keeping the old one in history

import { NbError } from "../entities/errors.ts";
import type { PushOutput } from "../entities/outputs.ts";
import { serializeMoment } from "../entities/moment.ts";
import type { Clock } from "../ports/clock.ts";
import type { MarkdownService } from "../ports/markdown-service.ts";
import type { RecordRepository } from "../ports/record-repository.ts";
import type { YamlService } from "../ports/yaml-service.ts";
import type { FindRecordUseCase } from "./find-record.ts";
import { MomentResolver } from "./resolve-moment.ts";
import { rewriteRecord } from "./rewrite-record.ts";

export interface PushDueInput {
  readonly id: string;
  readonly to: string; // expression, resolved against now
}

export interface PushDueDeps {
  readonly finder: FindRecordUseCase;
  readonly recordRepo: RecordRepository;
  readonly yamlService: YamlService;
  readonly markdownService: MarkdownService;
  readonly clock: Clock;
  readonly timeZone: string;
}

export class PushDueUseCase {
  private readonly resolver: MomentResolver;

  constructor(private readonly deps: PushDueDeps) {
    this.resolver = new MomentResolver(deps.timeZone);
  }

  async execute(input: PushDueInput): Promise<PushOutput> {
    const newDue = this.resolver.resolveStored(input.to, this.deps.clock.now());
    if (!newDue) {
      throw new NbError("invalid_args", "A new due date is required");
    }

    const { file, content, record } = await this.deps.finder.execute(input.id);

    const previousDue = record.due ? serializeMoment(record.due) : null;
    const due = serializeMoment(newDue);
    const raw = {
      ...record.raw,
      due,
      ...(previousDue
        ? { previous_due_dates: [...record.previousDueDates, previousDue] }
        : {}),
    };
    await this.deps.recordRepo.saveContent(
      file.path,
      rewriteRecord(this.deps, content, record.format, raw),
    );

    return { id: record.id, previousDue, due };
  }
}
