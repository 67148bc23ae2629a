/**
 * Serialize an updated raw mapping back into a record file.
 *
 * YAML records are rewritten whole; Markdown records only get the body of
 * their last `yaml` code block replaced, so the prose around it survives.
 */

import type { RawRecord, RecordFormat } from "../entities/record.ts";
import type { MarkdownService } from "../ports/markdown-service.ts";
import type { YamlService } from "../ports/yaml-service.ts";

export function rewriteRecord(
  services: {
    readonly yamlService: YamlService;
    readonly markdownService: MarkdownService;
  },
  content: string,
  format: RecordFormat,
  raw: RawRecord,
): string {
  const yaml = services.yamlService.stringify(raw);
  switch (format) {
    case "yaml":
      return yaml;
    case "markdown":
      return services.markdownService.replaceLastCodeBlock(
        content,
        "yaml",
        yaml,
      );
  }
}
