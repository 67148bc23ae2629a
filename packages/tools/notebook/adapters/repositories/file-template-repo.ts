/**
 * Adapter: FileTemplateRepository
 *
 * Reads record templates named `<type>.yaml` or `<type>.md`, searching
 * template directories in order (user templates before bundled ones).
 *
 * Dependencies: FileSystem (port).
 */

import {
  RECORD_FORMAT_EXTENSIONS,
  type RecordFormat,
  type RecordType,
} from "../../domain/entities/record.ts";
import type { FileSystem } from "../../domain/ports/filesystem.ts";
import type {
  RecordTemplate,
  TemplateRepository,
} from "../../domain/ports/template-repository.ts";

const FORMAT_PREFERENCE: readonly RecordFormat[] = ["yaml", "markdown"];

export class FileTemplateRepository implements TemplateRepository {
  constructor(
    private readonly fs: FileSystem,
    private readonly templateDirs: readonly string[],
  ) {}

  async find(
    type: RecordType,
    format?: RecordFormat,
  ): Promise<RecordTemplate | null> {
    const formats = format ? [format] : FORMAT_PREFERENCE;
    for (const dir of this.templateDirs) {
      for (const candidate of formats) {
        const path = `${dir}/${type}.${RECORD_FORMAT_EXTENSIONS[candidate]}`;
        if (await this.fs.exists(path)) {
          return { format: candidate, text: await this.fs.readFile(path) };
        }
      }
    }
    return null;
  }
}
