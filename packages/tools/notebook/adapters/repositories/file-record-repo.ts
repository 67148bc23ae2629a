/**
 * Adapter: FileRecordRepository
 *
 * Implements the RecordRepository port over a flat data directory of
 * `<timestamp>-<type>.<ext>` files.
 *
 * Dependencies:
 *   - FileSystem (port) for file operations
 *   - HashService (port) for record identifiers
 */

import type { RecordFile, RecordType } from "../../domain/entities/record.ts";
import type { FileSystem } from "../../domain/ports/filesystem.ts";
import type { HashService } from "../../domain/ports/hash-service.ts";
import type { RecordRepository } from "../../domain/ports/record-repository.ts";

export class FileRecordRepository implements RecordRepository {
  constructor(
    private readonly fs: FileSystem,
    private readonly hashService: HashService,
    private readonly dataDir: string,
  ) {}

  async list(types?: readonly RecordType[]): Promise<readonly RecordFile[]> {
    const files: RecordFile[] = [];
    for await (const filename of this.fs.readDir(this.dataDir)) {
      if (filename.startsWith(".")) continue;
      if (types && !types.some((type) => hasTypeSuffix(filename, type))) {
        continue;
      }
      files.push({
        id: await this.hashService.fileId(filename),
        path: this.pathFor(filename),
        filename,
      });
    }
    return files;
  }

  async loadContent(path: string): Promise<string> {
    return await this.fs.readFile(path);
  }

  async saveContent(path: string, content: string): Promise<void> {
    await this.fs.writeFile(path, content);
  }

  pathFor(filename: string): string {
    return `${this.dataDir}/${filename}`;
  }
}

/** `*-<type>.*`: the type is the last dash-separated part before the extension. */
function hasTypeSuffix(filename: string, type: RecordType): boolean {
  const dot = filename.lastIndexOf(".");
  const stem = dot === -1 ? filename : filename.slice(0, dot);
  return stem.endsWith(`-${type}`);
}
