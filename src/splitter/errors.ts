/**
 * Base error class for all splitter-related errors
 */
export class SplitterError extends Error {
  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
  }
}

/**
 * Thrown when a splitter is configured with a chunk size it cannot work with
 */
export class InvalidChunkSizeError extends SplitterError {
  constructor(public readonly chunkSize: number) {
    super(`Invalid chunk size ${chunkSize}: expected a positive integer number of characters.`);
  }
}
