/**
 * Thoroughly removes all types of whitespace characters from both ends of a string.
 * Handles spaces, tabs, line breaks, and carriage returns.
 */
export const fullTrim = (str: string): string => {
  return str.replace(/^[\s\r\n\t]+|[\s\r\n\t]+$/g, "");
};

/**
 * Delimiter line written after every chunk. `id` is the zero-based chunk index
 * and `length` the length of the trimmed chunk.
 */
export const chunkBreak = (id: number, length: number): string =>
  `\n\n--- CHUNK BREAK [id: ${id}, len: ${length}] ---\n\n`;

/**
 * Formats chunks for plain-text output: each chunk is trimmed and followed by
 * its chunk break line.
 */
export const formatChunks = (chunks: string[]): string => {
  let output = "";
  chunks.forEach((chunk, id) => {
    const trimmed = fullTrim(chunk);
    output += trimmed + chunkBreak(id, trimmed.length);
  });
  return output;
};
