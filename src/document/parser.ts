import type { Root } from "mdast";
import remarkGfm from "remark-gfm";
import remarkParse from "remark-parse";
import { unified } from "unified";
import { MarkdownParseError } from "./errors";

const processor = unified().use(remarkParse).use(remarkGfm);

/**
 * Parses markdown (CommonMark plus GitHub tables, strikethrough and
 * autolinks) into an mdast syntax tree.
 */
export function parseMarkdown(markdown: string): Root {
  try {
    return processor.parse(markdown);
  } catch (error) {
    throw new MarkdownParseError(
      error instanceof Error ? error.message : String(error),
      error instanceof Error ? error : undefined,
    );
  }
}
