// pattern: Functional Core

export class ToolDefinitionError extends Error {
  constructor(
    public toolName: string,
    message: string,
  ) {
    super(message);
    this.name = 'ToolDefinitionError';
  }
}

/**
 * Raised when a call cannot be bound to a tool's parameter list.
 * Messages follow the shape the sandbox reports for any other TypeError.
 */
export class ToolCallError extends Error {
  constructor(
    public toolName: string,
    message: string,
  ) {
    super(message);
    this.name = 'ToolCallError';
  }
}
