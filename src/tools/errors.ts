class ToolError extends Error {
  constructor(
    message: string,
    public readonly toolName: string,
  ) {
    super(message);
    this.name = this.constructor.name;
  }
}

/**
 * Error thrown when a tool cannot read the markdown document it was given.
 */
class DocumentReadError extends ToolError {
  constructor(
    public readonly filePath: string,
    reason: string,
    toolName: string,
  ) {
    super(`Failed to read ${filePath}: ${reason}`, toolName);
  }
}

export { DocumentReadError, ToolError };
