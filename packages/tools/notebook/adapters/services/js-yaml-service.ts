/**
 * Adapter: JsYamlService
 *
 * Concrete YamlService implementation using js-yaml with the YAML 1.2
 * core schema: timestamps load as plain strings and are written back
 * unchanged, so untouched keys survive a load/dump round trip.
 *
 * Dependencies: js-yaml.
 */

import { CORE_SCHEMA, dump, load } from "js-yaml";
import type { YamlService } from "../../domain/ports/yaml-service.ts";

export class JsYamlService implements YamlService {
  parse(yaml: string): unknown {
    if (!yaml.trim()) {
      return {};
    }
    return load(yaml, { schema: CORE_SCHEMA }) ?? {};
  }

  stringify(obj: Readonly<Record<string, unknown>>): string {
    if (Object.keys(obj).length === 0) {
      return "";
    }
    return dump(obj, { schema: CORE_SCHEMA, lineWidth: -1, noRefs: true });
  }
}
