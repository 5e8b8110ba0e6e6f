import fs from "node:fs/promises";
import { logger } from "../utils/logger";
import { DocumentReadError } from "./errors";

/**
 * Reads a markdown document as UTF-8 text.
 * @throws {DocumentReadError} If the file cannot be read
 */
export async function readDocument(filePath: string, toolName: string): Promise<string> {
  logger.debug(`Reading ${filePath}`);
  try {
    return await fs.readFile(filePath, "utf-8");
  } catch (error) {
    throw new DocumentReadError(
      filePath,
      error instanceof Error ? error.message : String(error),
      toolName,
    );
  }
}
