// ListRecordsUseCase - Parse every matching record file and filter for display
// One malformed file is reported in `failures`, never hides the rest

import { NbError } from "../entities/errors.ts";
import type { ListOutput, ParseFailure } from "../entities/outputs.ts";
import type { NoteRecord, RecordType } from "../entities/record.ts";
import { compareRecords } from "../entities/record-helpers.ts";
import type { RecordRepository } from "../ports/record-repository.ts";
import { mapSettled } from "./map-settled.ts";
import type { ParseRecordUseCase } from "./parse-record.ts";

export interface ListRecordsInput {
  readonly types?: readonly RecordType[];
  readonly showAll: boolean; // include completed and no-longer-relevant records
  readonly tag?: string;
}

export interface ListRecordsDeps {
  readonly recordRepo: RecordRepository;
  readonly parser: ParseRecordUseCase;
  readonly concurrency: number;
}

function failureMessage(reason: unknown): string {
  if (reason instanceof NbError) {
    return `${reason.code}: ${reason.message}`;
  }
  return reason instanceof Error ? reason.message : String(reason);
}

export class ListRecordsUseCase {
  constructor(private readonly deps: ListRecordsDeps) {}

  async execute(input: ListRecordsInput): Promise<ListOutput> {
    const files = await this.deps.recordRepo.list(input.types);

    const results = await mapSettled(
      files,
      this.deps.concurrency,
      async (file) => {
        const content = await this.deps.recordRepo.loadContent(file.path);
        return await this.deps.parser.execute({
          content,
          filename: file.filename,
          path: file.path,
        });
      },
    );

    const records: NoteRecord[] = [];
    const failures: ParseFailure[] = [];
    results.forEach((result, i) => {
      if (result.status === "fulfilled") {
        records.push(result.value);
      } else {
        failures.push({
          path: files[i].path,
          message: failureMessage(result.reason),
        });
      }
    });

    const visible = records
      .filter((r) => input.showAll || (r.stillRelevant && !r.completed))
      .filter((r) => !input.tag || r.tags.includes(input.tag))
      .sort(compareRecords);

    failures.sort((a, b) => a.path.localeCompare(b.path));
    return { records: visible, failures };
  }
}
