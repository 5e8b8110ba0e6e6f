import { DocumentTreeBuilder } from "../document/DocumentTreeBuilder";
import { toMarkdown } from "../document/nodes";
import { parseMarkdown } from "../document/parser";
import type { DocumentNode, TableNode } from "../document/types";
import { logger } from "../utils/logger";
import { fullTrim } from "../utils/string";
import { InvalidChunkSizeError } from "./errors";
import { TableContentSplitter } from "./splitters/TableContentSplitter";
import type { DocumentSplitter, SplitResult } from "./types";

/** Appended after the content of every paragraph and blockquote */
const BLOCK_SEPARATOR = "\n\n";

/**
 * Splits markdown into chunks of at most `maxChunkSize` characters along the
 * structure of the document.
 *
 * The document is first turned into a node tree in which every heading owns
 * the content below it. The tree is then walked depth first, accumulating the
 * markdown of each node into the current chunk:
 * 1. Children are chunked with the budget left after their parent's own text.
 * 2. When a child chunk does not fit, the current chunk is closed and the next
 *    one starts with the parent's own text again, so a chunk taken out of
 *    context still names the heading it belongs to.
 * 3. Tables are split by rows into `:::json_table` fragments; images become
 *    `[image:N]` placeholders and their URLs are returned separately.
 *
 * A single piece of text longer than the budget is never cut: it becomes a
 * chunk of its own, which is the only way a chunk can exceed `maxChunkSize`.
 */
export class StructuralMarkdownSplitter implements DocumentSplitter {
  public tableSplitter: TableContentSplitter;

  constructor(private maxChunkSize: number) {
    if (!Number.isInteger(maxChunkSize) || maxChunkSize <= 0) {
      throw new InvalidChunkSizeError(maxChunkSize);
    }
    this.tableSplitter = new TableContentSplitter();
  }

  /**
   * Main entry point for splitting markdown content
   */
  splitText(markdown: string): SplitResult {
    const builder = new DocumentTreeBuilder();
    const nodes = builder.build(parseMarkdown(markdown));
    const chunks = this.chunkNodes(nodes);

    chunks.forEach((chunk, id) => {
      if (chunk.length > this.maxChunkSize) {
        logger.warn(
          `Chunk ${id} has ${chunk.length} characters, more than the limit of ${this.maxChunkSize}: it holds content that cannot be split further.`,
        );
      }
    });
    logger.debug(`Split markdown into ${chunks.length} chunks`);

    return { chunks, images: builder.imageUrls };
  }

  /**
   * Chunks a sequence of sibling nodes with a budget of `charLimit`
   * characters per chunk.
   */
  chunkNodes(nodes: DocumentNode[], charLimit: number = this.maxChunkSize): string[] {
    const chunks: string[] = [];
    let currentChunk = "";

    const flush = (text: string) => {
      if (fullTrim(text) !== "") {
        chunks.push(text);
      }
    };

    for (const node of nodes) {
      if (node.type === "table") {
        currentChunk = this.appendTable(node, currentChunk, charLimit, flush);
        continue;
      }

      const section = toMarkdown(node);
      const trailer =
        node.type === "paragraph" || node.type === "blockquote" ? BLOCK_SEPARATOR : "";
      const budget = charLimit - trailer.length;

      if (currentChunk !== "" && currentChunk.length + section.length + trailer.length > charLimit) {
        flush(currentChunk);
        currentChunk = "";
      }

      const prefix = currentChunk;
      currentChunk += section;

      if (node.children.length > 0) {
        let childAppended = false;
        for (const child of this.chunkNodes(node.children, budget - section.length)) {
          if (currentChunk.length + child.length > budget && currentChunk !== section) {
            // Close the chunk and restart it from this node's own text. Until a
            // child has been added the section would only dangle at the end.
            flush(childAppended ? currentChunk : prefix);
            currentChunk = section;
          }
          currentChunk += child;
          childAppended = true;
        }
      }

      currentChunk += trailer;

      if (currentChunk !== section && currentChunk.length > charLimit) {
        flush(currentChunk);
        currentChunk = "";
      }
    }

    flush(currentChunk);
    return chunks;
  }

  /**
   * Adds a table to the current chunk. The first fragment fills the space left
   * in the current chunk, the middle fragments become chunks of their own and
   * the last one is returned as the new current chunk.
   */
  private appendTable(
    table: TableNode,
    currentChunk: string,
    charLimit: number,
    flush: (text: string) => void,
  ): string {
    const fragments = this.tableSplitter.split(
      table.data,
      charLimit - currentChunk.length,
      charLimit,
    );
    if (fragments.length === 0) {
      return currentChunk;
    }

    let accumulated = currentChunk;
    if (accumulated.length + fragments[0].length > charLimit) {
      flush(accumulated);
      accumulated = "";
    }

    fragments[0] = accumulated + fragments[0];
    for (const fragment of fragments.slice(0, -1)) {
      flush(fragment);
    }

    const last = fragments[fragments.length - 1];
    if (last.length > charLimit) {
      flush(last);
      return "";
    }
    return last;
  }
}
