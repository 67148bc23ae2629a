/**
 * Adapter: environment configuration
 *
 * Builds the NotebookConfig once at process start from environment
 * variables. Nothing below the CLI reads the environment.
 *
 * Dependencies: zod (validation), node:path, node:url.
 */

import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod/mini";
import {
  DEFAULT_CONCURRENCY,
  DEFAULT_EDITOR,
  DEFAULT_TIMEZONE,
  type NotebookConfig,
} from "../../domain/entities/config.ts";
import { NbError } from "../../domain/entities/errors.ts";

export const BUNDLED_TEMPLATES_DIR = join(
  dirname(fileURLToPath(import.meta.url)),
  "../../templates",
);

const EnvSchema = z.object({
  NOTES_PATH: z.optional(z.string()),
  NOTES_DATA_DIR: z.optional(z.string()),
  NOTES_TEMPLATES: z.optional(z.string()),
  NOTES_TIMEZONE: z.optional(z.string()),
  NOTES_CONCURRENCY: z.optional(z.string().check(z.regex(/^\d+$/))),
  EDITOR: z.optional(z.string()),
});

function isKnownTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone });
    return true;
  } catch {
    return false;
  }
}

/** Read configuration from an environment map (normally `process.env`). */
export function loadConfig(
  env: Readonly<Record<string, string | undefined>>,
): NotebookConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new NbError("invalid_config", `Invalid environment: ${details}`);
  }
  const vars = parsed.data;
  const notesPath = vars.NOTES_PATH || undefined;
  const userTemplates = vars.NOTES_TEMPLATES ||
    (notesPath ? join(notesPath, "templates") : undefined);

  const timeZone = vars.NOTES_TIMEZONE || DEFAULT_TIMEZONE;
  if (!isKnownTimeZone(timeZone)) {
    throw new NbError("invalid_config", `Unknown time zone: ${timeZone}`);
  }

  const concurrency = vars.NOTES_CONCURRENCY
    ? Number(vars.NOTES_CONCURRENCY)
    : DEFAULT_CONCURRENCY;
  if (concurrency < 1) {
    throw new NbError(
      "invalid_config",
      `NOTES_CONCURRENCY must be at least 1, got ${concurrency}`,
    );
  }

  return {
    timeZone,
    dataDir: vars.NOTES_DATA_DIR ||
      (notesPath ? join(notesPath, "data") : null),
    templateDirs: userTemplates
      ? [userTemplates, BUNDLED_TEMPLATES_DIR]
      : [BUNDLED_TEMPLATES_DIR],
    editor: vars.EDITOR || DEFAULT_EDITOR,
    concurrency,
  };
}

/** The data directory, or an invalid_config error for commands that need it. */
export function requireDataDir(config: NotebookConfig): string {
  if (!config.dataDir) {
    throw new NbError(
      "invalid_config",
      "No data directory: set NOTES_PATH or NOTES_DATA_DIR",
    );
  }
  return config.dataDir;
}
