// CreateRecordUseCase - New record from a template, written in the user's editor

import { NbError } from "../entities/errors.ts";
import type { CreateOutput } from "../entities/outputs.ts";
import { serializeMoment } from "../entities/moment.ts";
import {
  RECORD_FORMAT_EXTENSIONS,
  type RecordFormat,
  type RecordType,
} from "../entities/record.ts";
import type { Clock } from "../ports/clock.ts";
import type { Editor } from "../ports/editor.ts";
import type { RecordRepository } from "../ports/record-repository.ts";
import type { TemplateRepository } from "../ports/template-repository.ts";
import type { ParseRecordUseCase } from "./parse-record.ts";

const DATE_PLACEHOLDER = "{{date}}";

export interface CreateRecordInput {
  readonly type: RecordType;
  readonly format?: RecordFormat;
}

export interface CreateRecordDeps {
  readonly templateRepo: TemplateRepository;
  readonly recordRepo: RecordRepository;
  readonly parser: ParseRecordUseCase;
  readonly editor: Editor;
  readonly clock: Clock;
}

export class CreateRecordUseCase {
  constructor(private readonly deps: CreateRecordDeps) {}

  async execute(input: CreateRecordInput): Promise<CreateOutput> {
    const template = await this.deps.templateRepo.find(input.type, input.format);
    if (!template) {
      throw new NbError(
        "invalid_args",
        `No template for record type: ${input.type}`,
      );
    }

    const stamp = serializeMoment(this.deps.clock.now());
    const ext = RECORD_FORMAT_EXTENSIONS[template.format];
    const text = template.text.replaceAll(DATE_PLACEHOLDER, stamp);

    const edited = await this.deps.editor.edit(text, `.${ext}`);
    if (edited === text) {
      throw new NbError(
        "no_changes",
        "No changes made to template; aborting.",
      );
    }

    const filename = `${stamp}-${input.type}.${ext}`;
    const path = this.deps.recordRepo.pathFor(filename);
    // Parse before saving so a broken record never lands in the data dir
    const record = await this.deps.parser.execute({
      content: edited,
      filename,
      path,
    });
    await this.deps.recordRepo.saveContent(path, edited);

    return { id: record.id, filename };
  }
}
