// Configuration entity - built once at process start, passed to use cases

export const DEFAULT_TIMEZONE = "America/Los_Angeles";
export const DEFAULT_EDITOR = "vim";
export const DEFAULT_CONCURRENCY = 8;

export type NotebookConfig = {
  readonly timeZone: string;
  readonly dataDir: string | null; // null when neither NOTES_DATA_DIR nor NOTES_PATH is set
  readonly templateDirs: readonly string[]; // searched in order
  readonly editor: string;
  readonly concurrency: number;
};
