/**
 * Port: YamlService
 *
 * Abstracts YAML parsing/serialization so the domain does not depend
 * on a specific YAML library.
 */

/** YAML parsing and serialization of record mappings */
export interface YamlService {
  /**
   * Parse a YAML document. Timestamps stay strings so that date-only
   * and offset-less values can be told apart later.
   * Throws on a syntax error.
   */
  parse(yaml: string): unknown;

  /** Serialize a mapping to YAML, keys in insertion order. */
  stringify(obj: Readonly<Record<string, unknown>>): string;
}
