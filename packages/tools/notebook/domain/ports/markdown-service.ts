// Markdown service port - interface for reading record markdown files

/** A heading found outside code blocks. `line` is 1-indexed. */
export type Heading = {
  readonly level: number;
  readonly title: string;
  readonly line: number;
};

/**
 * A fenced code block. `line`/`lineEnd` are the 1-indexed fence lines
 * (`lineEnd` is the last line of the file for an unclosed fence).
 */
export type CodeBlock = {
  readonly info: string;
  readonly literal: string;
  readonly line: number;
  readonly lineEnd: number;
  readonly closed: boolean;
};

/** Headings and code blocks in document order. */
export type MarkdownOutline = {
  readonly headings: readonly Heading[];
  readonly codeBlocks: readonly CodeBlock[];
};

/**
 * Service for reading and patching record markdown files.
 */
export interface MarkdownService {
  /** Collect headings and fenced code blocks. */
  outline(content: string): MarkdownOutline;

  /**
   * Replace the body of the last code block tagged `info`,
   * leaving every other line untouched.
   */
  replaceLastCodeBlock(content: string, info: string, body: string): string;
}
