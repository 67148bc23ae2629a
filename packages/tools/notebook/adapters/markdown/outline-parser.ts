/**
 * Adapter: OutlineMarkdownService
 *
 * Line-based MarkdownService: finds ATX (`# Title`) and setext
 * (`Title` over `=====`) headings outside code blocks, and fenced code
 * blocks (``` or ~~~) with their info strings.
 *
 * Dependencies: domain ports only.
 */

import type {
  CodeBlock,
  Heading,
  MarkdownOutline,
  MarkdownService,
} from "../../domain/ports/markdown-service.ts";

const HEADER_REGEX = /^ {0,3}(#{1,6})\s+(.+?)(?:\s+#+)?\s*$/;
const FENCE_OPEN = /^ {0,3}(`{3,}|~{3,})\s*([^`]*)$/;
// Underline turning the paragraph above it into a heading: = is 1, - is 2
const SETEXT_UNDERLINE = /^ {0,3}(=+|-+)\s*$/;

type Paragraph = {
  readonly lines: string[];
  readonly line: number;
};

type OpenFence = {
  readonly marker: string;
  readonly info: string;
  readonly line: number;
};

function closesFence(line: string, fence: OpenFence): boolean {
  const trimmed = line.trim();
  return trimmed.length >= fence.marker.length &&
    trimmed === fence.marker[0].repeat(trimmed.length);
}

export class OutlineMarkdownService implements MarkdownService {
  outline(content: string): MarkdownOutline {
    const lines = content.split("\n");
    const headings: Heading[] = [];
    const codeBlocks: CodeBlock[] = [];

    let fence: OpenFence | null = null;
    let body: string[] = [];
    let paragraph: Paragraph | null = null;

    for (let i = 0; i < lines.length; i++) {
      const line = lines[i].replace(/\r$/, "");

      if (fence) {
        if (closesFence(line, fence)) {
          codeBlocks.push({
            info: fence.info,
            literal: body.map((l) => l + "\n").join(""),
            line: fence.line,
            lineEnd: i + 1,
            closed: true,
          });
          fence = null;
        } else {
          body.push(line);
        }
        continue;
      }

      const open = line.match(FENCE_OPEN);
      if (open) {
        fence = { marker: open[1], info: open[2].trim(), line: i + 1 };
        body = [];
        paragraph = null;
        continue;
      }

      const underline = paragraph ? line.match(SETEXT_UNDERLINE) : null;
      if (paragraph && underline) {
        headings.push({
          level: underline[1].startsWith("=") ? 1 : 2,
          title: paragraph.lines.join(" "),
          line: paragraph.line,
        });
        paragraph = null;
        continue;
      }

      const match = line.match(HEADER_REGEX);
      if (match) {
        headings.push({
          level: match[1].length,
          title: match[2].trim(),
          line: i + 1,
        });
        paragraph = null;
      } else if (line.trim() === "") {
        paragraph = null;
      } else if (paragraph) {
        paragraph.lines.push(line.trim());
      } else {
        paragraph = { lines: [line.trim()], line: i + 1 };
      }
    }

    // An unclosed fence runs to the end of the document
    if (fence) {
      codeBlocks.push({
        info: fence.info,
        literal: body.map((l) => l + "\n").join(""),
        line: fence.line,
        lineEnd: lines.length,
        closed: false,
      });
    }

    return { headings, codeBlocks };
  }

  replaceLastCodeBlock(content: string, info: string, body: string): string {
    const block = this.outline(content).codeBlocks.findLast((b) =>
      b.info === info
    );
    if (!block) {
      return content;
    }

    const lines = content.split("\n");
    const replacement = body.endsWith("\n") ? body.slice(0, -1) : body;
    const bodyLines = replacement === "" ? [] : replacement.split("\n");
    // Fence lines are 1-indexed; the body sits strictly between them
    const bodyStart = block.line;
    const bodyEnd = block.closed ? block.lineEnd - 1 : block.lineEnd;

    return [
      ...lines.slice(0, bodyStart),
      ...bodyLines,
      ...lines.slice(bodyEnd),
    ].join("\n");
  }
}
