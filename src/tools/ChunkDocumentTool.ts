import { DEFAULT_CHUNK_SIZE } from "../config";
import { StructuralMarkdownSplitter } from "../splitter/StructuralMarkdownSplitter";
import type { SplitResult } from "../splitter/types";
import { logger } from "../utils/logger";
import { ToolError } from "./errors";
import { readDocument } from "./readDocument";

export interface ChunkDocumentToolOptions {
  /** Path of the markdown file to chunk */
  filePath: string;

  /**
   * Maximum number of characters per chunk.
   * @default DEFAULT_CHUNK_SIZE
   */
  chunkSize?: number;
}

/**
 * Tool for splitting a markdown file into structure-preserving chunks.
 * Returns the chunks together with the image URLs their `[image:N]`
 * placeholders refer to.
 */
export class ChunkDocumentTool {
  /**
   * @throws {ToolError} If the file cannot be read or the chunk size is invalid
   */
  async execute(options: ChunkDocumentToolOptions): Promise<SplitResult> {
    const { filePath, chunkSize = DEFAULT_CHUNK_SIZE } = options;
    const markdown = await readDocument(filePath, this.constructor.name);

    logger.info(`✂️ Chunking ${filePath} (max ${chunkSize} characters per chunk)...`);
    try {
      const splitter = new StructuralMarkdownSplitter(chunkSize);
      const result = splitter.splitText(markdown);
      logger.info(
        `✅ Split ${filePath} into ${result.chunks.length} chunks with ${result.images.length} images`,
      );
      return result;
    } catch (error) {
      throw new ToolError(
        `Failed to chunk ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
        this.constructor.name,
      );
    }
  }
}
