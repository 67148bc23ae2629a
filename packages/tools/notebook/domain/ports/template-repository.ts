// Template repository port - record templates by type

import type { RecordFormat, RecordType } from "../entities/record.ts";

export type RecordTemplate = {
  readonly format: RecordFormat;
  readonly text: string;
};

export interface TemplateRepository {
  /**
   * Find the template for a record type. With `format`, only that format
   * is considered; otherwise YAML is preferred over Markdown.
   * Returns null if none exists.
   */
  find(type: RecordType, format?: RecordFormat): Promise<RecordTemplate | null>;
}
