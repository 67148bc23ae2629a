// EditRecordUseCase - Open an existing record in the editor, then re-check it

import type { ShowOutput } from "../entities/outputs.ts";
import type { Editor } from "../ports/editor.ts";
import type { FindRecordUseCase } from "./find-record.ts";

export interface EditRecordInput {
  readonly id: string;
}

export class EditRecordUseCase {
  constructor(
    private readonly finder: FindRecordUseCase,
    private readonly editor: Editor,
  ) {}

  async execute(input: EditRecordInput): Promise<ShowOutput> {
    const file = await this.finder.locate(input.id);
    await this.editor.open(file.path);
    const { record } = await this.finder.load(file);
    return { record };
  }
}
