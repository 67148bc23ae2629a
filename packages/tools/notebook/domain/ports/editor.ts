// Editor port - the interactive text editor the user works in

/**
 * Blocking editor session. Implementations hand the terminal to the
 * editor and return once it exits.
 */
export interface Editor {
  /** Edit `text` in a scratch file with the given suffix; returns the saved text. */
  edit(text: string, suffix: string): Promise<string>;

  /** Open an existing file in place. */
  open(path: string): Promise<void>;
}
