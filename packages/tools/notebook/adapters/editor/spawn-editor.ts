/**
 * Adapter: SpawnEditor
 *
 * Editor implementation that runs the configured editor command with the
 * terminal inherited and waits for it to exit.
 *
 * Dependencies: node:child_process, node:fs/promises, node:os.
 */

import { spawn } from "node:child_process";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { NbError } from "../../domain/entities/errors.ts";
import type { Editor } from "../../domain/ports/editor.ts";

export class SpawnEditor implements Editor {
  constructor(private readonly command: string) {}

  async edit(text: string, suffix: string): Promise<string> {
    const dir = await mkdtemp(join(tmpdir(), "nb-"));
    const path = join(dir, `record${suffix}`);
    try {
      await writeFile(path, text, "utf8");
      await this.open(path);
      return await readFile(path, "utf8");
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  }

  open(path: string): Promise<void> {
    const [executable, ...args] = this.command.split(/\s+/).filter(Boolean);
    if (!executable) {
      return Promise.reject(
        new NbError("invalid_config", "No editor configured (set $EDITOR)"),
      );
    }

    return new Promise((resolve, reject) => {
      const child = spawn(executable, [...args, path], { stdio: "inherit" });
      child.on("error", (e) => {
        reject(
          new NbError(
            "io_error",
            `Failed to start editor '${executable}': ${e.message}`,
          ),
        );
      });
      child.on("exit", (code) => {
        if (code === 0) {
          resolve();
        } else {
          reject(
            new NbError(
              "io_error",
              `Editor '${executable}' exited with code ${code ?? "null"}`,
            ),
          );
        }
      });
    });
  }
}
