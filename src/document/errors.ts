/**
 * Base error class for failures while turning markdown into a document tree
 */
export class DocumentError extends Error {
  constructor(
    message: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = this.constructor.name;
    if (cause?.stack) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

/**
 * Thrown when the markdown parser rejects its input
 */
export class MarkdownParseError extends DocumentError {
  constructor(message: string, cause?: Error) {
    super(`Failed to parse markdown: ${message}`, cause);
  }
}
