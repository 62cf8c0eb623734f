/**
 * Thrown when the model produces tool arguments that are not valid JSON,
 * are not an object, or fail the tool's parameter schema.
 */
export class MalformedToolArgsError extends Error {
  constructor(
    public readonly toolName: string,
    public readonly rawArgs: string,
    public readonly parseError: string
  ) {
    super(`Malformed arguments for tool "${toolName}": ${parseError}`);
    this.name = 'MalformedToolArgsError';
  }
}

/**
 * Thrown when a single model step proposes two tool calls with the same
 * name and canonical arguments.
 */
export class DuplicateToolCallError extends Error {
  constructor(
    public readonly toolName: string,
    public readonly signature: string
  ) {
    super(`Duplicate tool call in one step: ${signature}`);
    this.name = 'DuplicateToolCallError';
  }
}
