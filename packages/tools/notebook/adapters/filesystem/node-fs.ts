/**
 * Adapter: NodeFileSystem
 *
 * Concrete FileSystem implementation backed by node:fs/promises.
 * Maps Node error codes onto NbError so callers see one error type.
 *
 * Dependencies: node:fs/promises.
 */

import { readdir, readFile, stat, writeFile } from "node:fs/promises";
import type { FileSystem } from "../../domain/ports/filesystem.ts";
import { NbError } from "../../domain/entities/errors.ts";

function errorCode(e: unknown): string | undefined {
  if (e instanceof Error && "code" in e && typeof e.code === "string") {
    return e.code;
  }
  return undefined;
}

function reasonOf(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

export class NodeFileSystem implements FileSystem {
  async readFile(path: string): Promise<string> {
    try {
      return await readFile(path, "utf8");
    } catch (e) {
      if (errorCode(e) === "ENOENT") {
        throw new NbError("io_error", `File not found: ${path}`, path);
      }
      throw new NbError(
        "io_error",
        `Failed to read file: ${path}: ${reasonOf(e)}`,
        path,
      );
    }
  }

  async writeFile(path: string, content: string): Promise<void> {
    try {
      await writeFile(path, content, "utf8");
    } catch (e) {
      throw new NbError(
        "io_error",
        `Failed to write file: ${path}: ${reasonOf(e)}`,
        path,
      );
    }
  }

  async exists(path: string): Promise<boolean> {
    try {
      await stat(path);
      return true;
    } catch (e) {
      if (errorCode(e) === "ENOENT") {
        return false;
      }
      throw e;
    }
  }

  async *readDir(path: string): AsyncIterable<string> {
    let entries: string[];
    try {
      entries = await readdir(path);
    } catch (e) {
      if (errorCode(e) === "ENOENT") {
        throw new NbError("io_error", `Directory not found: ${path}`, path);
      }
      throw e;
    }
    yield* entries;
  }
}
