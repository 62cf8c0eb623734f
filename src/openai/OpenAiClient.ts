import OpenAI from 'openai';
import type { ChatCompletionMessageParam, ChatCompletionTool } from 'openai/resources/chat/completions';
import pino from 'pino';
import { config } from '../config.js';
import { AppError } from '../errors/AppError.js';
import { withTimeout } from '../http/timeout.js';

const logger = pino({ name: 'OpenAiClient' });

export interface ToolDefinition {
  name: string;
  description: string;
  parameters: Record<string, unknown>;
}

export interface RunWithToolsInput {
  input: ChatCompletionMessageParam[];
  tools?: ToolDefinition[];
  model?: string;
  maxTokens?: number;
  /** Wall-clock limit for the call; defaults to LLM_TIMEOUT_MS */
  timeoutMs?: number;
  /** Label for logs and timeout errors (e.g. 'orchestrator.route') */
  route?: string;
}

export interface ToolCall {
  id: string;
  name: string;
  arguments: string;
}

export interface OpenAiResponse {
  content: string | null;
  toolCalls: ToolCall[];
}

/**
 * The function-calling completion boundary. Agents depend on this, not on
 * the SDK, so tests can script responses.
 */
export interface ChatCompletionProvider {
  runWithTools(options: RunWithToolsInput): Promise<OpenAiResponse>;
}

export interface EmbeddingProvider {
  embed(text: string): Promise<number[]>;
}

export interface OpenAiClientOptions {
  apiKey: string;
  baseUrl?: string;
  defaultModel?: string;
  embeddingModel?: string;
}

/**
 * Thin wrapper around the OpenAI SDK for tool calling and embeddings.
 *
 * Every call runs under withTimeout, which aborts the HTTP request through
 * the SDK's signal option and raises a TIMEOUT AppError.
 */
export class OpenAiClient implements ChatCompletionProvider, EmbeddingProvider {
  private readonly client: OpenAI;
  private readonly defaultModel: string;
  private readonly embeddingModel: string;
  private readonly defaultTimeoutMs: number;
  private readonly maxRetries: number;

  constructor(options: OpenAiClientOptions) {
    this.defaultTimeoutMs = config.timeouts.llmMs;
    this.maxRetries = config.openai.maxRetries;

    this.client = new OpenAI({
      apiKey: options.apiKey,
      baseURL: options.baseUrl,
      maxRetries: this.maxRetries,
    });
    this.defaultModel = options.defaultModel ?? 'gpt-4o-mini';
    this.embeddingModel = options.embeddingModel ?? 'text-embedding-3-small';

    if (config.debug) {
      logger.debug({
        defaultTimeoutMs: this.defaultTimeoutMs,
        maxRetries: this.maxRetries,
        model: this.defaultModel,
      }, 'OpenAI client initialized');
    }
  }

  /**
   * Run a chat completion with optional tool definitions.
   */
  async runWithTools(options: RunWithToolsInput): Promise<OpenAiResponse> {
    const { input, tools, model, maxTokens, route } = options;
    const timeoutMs = options.timeoutMs ?? this.defaultTimeoutMs;
    const label = route ?? 'chat.completions';

    if (config.debug) {
      logger.debug({
        route: label,
        timeoutMs,
        model: model ?? this.defaultModel,
        messageCount: input.length,
        toolCount: tools?.length ?? 0,
      }, 'OpenAI request starting');
    }

    const startTime = Date.now();

    const chatTools: ChatCompletionTool[] | undefined = tools && tools.length > 0
      ? tools.map((tool) => ({
        type: 'function' as const,
        function: {
          name: tool.name,
          description: tool.description,
          parameters: tool.parameters,
        },
      }))
      : undefined;

    try {
      const response = await withTimeout(
        (signal) => this.client.chat.completions.create(
          {
            model: model ?? this.defaultModel,
            messages: input,
            tools: chatTools,
            tool_choice: chatTools ? 'auto' : undefined,
            max_tokens: maxTokens,
          },
          { signal }
        ),
        timeoutMs,
        label
      );

      const choice = response.choices[0];

      if (config.debug) {
        logger.debug({
          route: label,
          elapsedMs: Date.now() - startTime,
          finishReason: choice?.finish_reason,
        }, 'OpenAI request completed');
      }

      const message = choice?.message;
      const toolCalls: ToolCall[] = [];
      for (const tc of message?.tool_calls ?? []) {
        if (tc.type === 'function') {
          toolCalls.push({ id: tc.id, name: tc.function.name, arguments: tc.function.arguments });
        }
      }

      return {
        content: message?.content ?? null,
        toolCalls,
      };
    } catch (error) {
      logger.error({
        route: label,
        elapsedMs: Date.now() - startTime,
        configuredTimeoutMs: timeoutMs,
        error: error instanceof Error ? { name: error.name, message: error.message } : { message: String(error) },
      }, 'OpenAI request failed');

      throw error;
    }
  }

  async embed(text: string): Promise<number[]> {
    const response = await withTimeout(
      (signal) => this.client.embeddings.create({ model: this.embeddingModel, input: text }, { signal }),
      this.defaultTimeoutMs,
      'embeddings'
    );
    const embedding = response.data[0]?.embedding;
    if (!embedding) {
      throw AppError.retrieval('Embedding response contained no vectors');
    }
    return embedding;
  }
}
