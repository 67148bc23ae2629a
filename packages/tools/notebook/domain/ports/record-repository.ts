// Record repository port - where record files live

import type { RecordFile, RecordType } from "../entities/record.ts";

/**
 * Repository for enumerating and rewriting record files.
 */
export interface RecordRepository {
  /**
   * List record files named `<timestamp>-<type>.<ext>`, restricted to
   * `types` when given. Order is unspecified.
   */
  list(types?: readonly RecordType[]): Promise<readonly RecordFile[]>;

  /** Load raw file content. */
  loadContent(path: string): Promise<string>;

  /** Replace the whole file content. */
  saveContent(path: string, content: string): Promise<void>;

  /** Get the filesystem path for a file name in the data directory. */
  pathFor(filename: string): string;
}
