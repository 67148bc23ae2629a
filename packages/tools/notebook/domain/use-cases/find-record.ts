// FindRecordUseCase - Locate one record by id (or unique id prefix) and parse it

import type { NoteRecord, RecordFile } from "../entities/record.ts";
import { resolveRecordId } from "../entities/record-helpers.ts";
import type { RecordRepository } from "../ports/record-repository.ts";
import type { ParseRecordUseCase } from "./parse-record.ts";

export type FoundRecord = {
  readonly file: RecordFile;
  readonly content: string;
  readonly record: NoteRecord;
};

export class FindRecordUseCase {
  constructor(
    private readonly recordRepo: RecordRepository,
    private readonly parser: ParseRecordUseCase,
  ) {}

  async execute(idOrPrefix: string): Promise<FoundRecord> {
    return await this.load(await this.locate(idOrPrefix));
  }

  /** Resolve the file without parsing it, so broken records can be opened. */
  async locate(idOrPrefix: string): Promise<RecordFile> {
    return resolveRecordId(idOrPrefix, await this.recordRepo.list());
  }

  /** Read and parse a known file. Parse errors propagate. */
  async load(file: RecordFile): Promise<FoundRecord> {
    const content = await this.recordRepo.loadContent(file.path);
    const record = await this.parser.execute({
      content,
      filename: file.filename,
      path: file.path,
    });
    return { file, content, record };
  }
}
