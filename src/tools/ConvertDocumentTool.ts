import { DocumentTreeBuilder } from "../document/DocumentTreeBuilder";
import { serializeDocument } from "../document/nodes";
import { parseMarkdown } from "../document/parser";
import { MarkdownRenderer } from "../renderer/MarkdownRenderer";
import { logger } from "../utils/logger";
import { ToolError } from "./errors";
import { readDocument } from "./readDocument";

/**
 * Output formats of the conversion tool
 */
export enum ConvertFormat {
  /** The document node tree as indented JSON */
  Json = "json",
  /** The document re-serialized as normalized markdown */
  Markdown = "markdown",
}

export interface ConvertDocumentToolOptions {
  /** Path of the markdown file to convert */
  filePath: string;
  format: ConvertFormat;
}

/**
 * Tool for converting a markdown file into its document tree or into
 * normalized markdown.
 */
export class ConvertDocumentTool {
  /**
   * @throws {ToolError} If the file cannot be read or parsed
   */
  async execute(options: ConvertDocumentToolOptions): Promise<string> {
    const { filePath, format } = options;
    const markdown = await readDocument(filePath, this.constructor.name);

    logger.info(`🔄 Converting ${filePath} to ${format}...`);
    try {
      switch (format) {
        case ConvertFormat.Json: {
          const nodes = new DocumentTreeBuilder().build(parseMarkdown(markdown));
          return serializeDocument(nodes);
        }
        case ConvertFormat.Markdown:
          return new MarkdownRenderer().render(markdown);
      }
    } catch (error) {
      throw new ToolError(
        `Failed to convert ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
        this.constructor.name,
      );
    }
  }
}
