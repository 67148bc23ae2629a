// Error types for notebook domain

export type NbErrorCode =
  | "unrecognized_expression"
  | "malformed_record"
  | "unknown_extension"
  | "record_not_found"
  | "ambiguous_record_id"
  | "invalid_config"
  | "invalid_args"
  | "no_changes"
  | "io_error";

export class NbError extends Error {
  constructor(
    public readonly code: NbErrorCode,
    message: string,
    public readonly file?: string,
  ) {
    super(message);
    this.name = "NbError";
  }

  /** Copy of this error attributed to a file, keeping code and message. */
  withFile(file: string): NbError {
    return new NbError(this.code, this.message, file);
  }

  toJSON(): { error: string; code: NbErrorCode; message: string; file?: string } {
    return {
      error: this.code,
      code: this.code,
      message: this.message,
      ...(this.file ? { file: this.file } : {}),
    };
  }
}
