/**
 * Adapter: InMemoryFileSystem
 *
 * FileSystem kept in a path -> content map, for tests. Directories exist
 * implicitly above every file and follow the NodeFileSystem error behavior
 * (missing paths are io_error).
 */

import type { FileSystem } from "../../domain/ports/filesystem.ts";
import { NbError } from "../../domain/entities/errors.ts";

function parentsOf(path: string): string[] {
  const parts = path.split("/");
  return parts.slice(1, -1).map((_, i) => parts.slice(0, i + 2).join("/"));
}

export class InMemoryFileSystem implements FileSystem {
  private readonly files = new Map<string, string>();
  private readonly dirs = new Set<string>();

  constructor(initial: Readonly<Record<string, string>> = {}) {
    for (const [path, content] of Object.entries(initial)) {
      this.setFile(path, content);
    }
  }

  readFile(path: string): Promise<string> {
    const content = this.files.get(path);
    if (content === undefined) {
      return Promise.reject(
        new NbError("io_error", `File not found: ${path}`, path),
      );
    }
    return Promise.resolve(content);
  }

  writeFile(path: string, content: string): Promise<void> {
    this.setFile(path, content);
    return Promise.resolve();
  }

  exists(path: string): Promise<boolean> {
    return Promise.resolve(this.files.has(path) || this.dirs.has(path));
  }

  async *readDir(path: string): AsyncIterable<string> {
    const dir = path.endsWith("/") ? path.slice(0, -1) : path;
    if (!this.dirs.has(dir)) {
      throw new NbError("io_error", `Directory not found: ${path}`, path);
    }
    const prefix = `${dir}/`;
    const seen = new Set<string>();
    for (const entry of [...this.files.keys(), ...this.dirs]) {
      if (!entry.startsWith(prefix)) continue;
      const name = entry.slice(prefix.length).split("/")[0];
      if (name && !seen.has(name)) {
        seen.add(name);
        yield name;
      }
    }
  }

  // --- Test helpers ---

  /** Copy of every stored file, by path. */
  getAll(): Map<string, string> {
    return new Map(this.files);
  }

  /** Store a file, creating its parent directories. */
  setFile(path: string, content: string): void {
    for (const dir of parentsOf(path)) {
      this.dirs.add(dir);
    }
    this.files.set(path, content);
  }

  get size(): number {
    return this.files.size;
  }
}
