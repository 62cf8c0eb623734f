import { z } from 'zod';
import type { AppError } from '../errors/AppError.js';
import { MalformedToolArgsError } from '../errors/protocolErrors.js';
import type { ToolDefinition } from '../openai/OpenAiClient.js';
import type { SourceDocument } from '../retrieval/types.js';

export type SearchParameters = Record<string, string | number | boolean>;

/**
 * Per-invocation data a tool executes against. Never exposed to the model.
 */
export interface ToolContext {
  sessionId: string;
  /** The query the handler was invoked with */
  query: string;
  minSimilarity: number;
}

export interface ToolOutcome {
  /** Text appended to the conversation as the tool-role message */
  output: string;
  sources?: SourceDocument[];
}

/**
 * A handler's set of tools. Calls are parsed once into a typed union,
 * then executed through one exhaustive dispatch.
 */
export interface ToolRegistry<TCall extends { name: string }> {
  readonly definitions: ToolDefinition[];
  /**
   * Parse a proposed call. Returns null for a name this registry does not know;
   * throws MalformedToolArgsError when the arguments are not usable.
   */
  parse(name: string, rawArgs: string): TCall | null;
  execute(call: TCall, context: ToolContext): Promise<ToolOutcome>;
  /** Text returned to the model when execution throws (timeouts, store failures) */
  describeFailure(call: TCall, error: AppError): string;
  /** Arguments of the handler's search action, echoed back to API callers */
  captureSearchParameters?(call: TCall, context: ToolContext): SearchParameters | undefined;
}

/**
 * Build an OpenAI tool definition from a zod schema.
 * Input mode keeps defaulted fields optional for the model.
 */
export function defineTool(name: string, description: string, schema: z.ZodType): ToolDefinition {
  const jsonSchema = z.toJSONSchema(schema, { io: 'input' });
  // OpenAI does not take the $schema property
  const parameters = Object.fromEntries(
    Object.entries(jsonSchema).filter(([key]) => key !== '$schema')
  );
  return { name, description, parameters };
}

/**
 * Parse raw tool-call arguments: JSON object first, then the tool schema.
 */
export function parseToolArguments<S extends z.ZodType>(
  toolName: string,
  rawArgs: string,
  schema: S
): z.output<S> {
  let parsed: unknown;
  try {
    parsed = rawArgs.trim() === '' ? {} : JSON.parse(rawArgs);
  } catch (error) {
    throw new MalformedToolArgsError(
      toolName,
      rawArgs,
      error instanceof Error ? error.message : 'Invalid JSON'
    );
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new MalformedToolArgsError(toolName, rawArgs, 'Arguments must be a JSON object');
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new MalformedToolArgsError(toolName, rawArgs, issues);
  }
  return result.data;
}

/**
 * Stable text form of tool arguments: object keys sorted at every depth.
 * Two calls with the same name and canonical arguments are the same call.
 */
export function canonicalJson(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map(canonicalJson).join(',')}]`;
  }
  if (typeof value === 'object' && value !== null) {
    const entries = Object.entries(value)
      .filter(([, entry]) => entry !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return `{${entries.map(([key, entry]) => `${JSON.stringify(key)}:${canonicalJson(entry)}`).join(',')}}`;
  }
  return JSON.stringify(value) ?? 'null';
}

export function assertNever(value: never): never {
  throw new Error(`Unhandled tool call: ${JSON.stringify(value)}`);
}
