/**
 * Adapter: Blake2HashService
 *
 * Concrete HashService implementation using node:crypto.
 *
 * Identifier = first 10 hex characters of BLAKE2s-256 over the UTF-8
 * file name, so ids stay stable across renames of the data directory.
 */

import { createHash } from "node:crypto";
import type { HashService } from "../../domain/ports/hash-service.ts";

const ID_LENGTH = 10;

export class Blake2HashService implements HashService {
  fileId(filename: string): Promise<string> {
    const digest = createHash("blake2s256").update(filename, "utf8").digest(
      "hex",
    );
    return Promise.resolve(digest.slice(0, ID_LENGTH));
  }
}
