import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';
import pino from 'pino';
import { config } from '../config.js';
import { mapError } from '../errors/mapError.js';
import { DuplicateToolCallError } from '../errors/protocolErrors.js';
import { isTimeoutError } from '../http/timeout.js';
import type { ChatCompletionProvider, OpenAiResponse, ToolCall } from '../openai/OpenAiClient.js';
import type { SourceDocument } from '../retrieval/types.js';
import {
  EMPTY_AGENT_RESPONSE,
  MAX_STEPS_FALLBACK_RESPONSE,
  TIMEOUT_FALLBACK_RESPONSE,
} from './prompts.js';
import { canonicalJson, type SearchParameters, type ToolContext, type ToolRegistry } from './tools.js';

const logger = pino({ name: 'AgentRunner' });

export interface AgentRunnerOptions<TCall extends { name: string }> {
  /** Handler name used in logs */
  name: string;
  provider: ChatCompletionProvider;
  registry: ToolRegistry<TCall>;
  systemPrompt: string;
  model?: string;
  maxSteps?: number;
  maxTokens?: number;
  llmTimeoutMs?: number;
}

export interface AgentInvocation {
  query: string;
  sessionId: string;
  /** Conversation so far, without a system message */
  priorMessages: ChatCompletionMessageParam[];
  minSimilarity: number;
}

export type AgentOutcome = 'completed' | 'max_steps' | 'timeout';

export interface AgentResult {
  responseText: string;
  sources: SourceDocument[];
  searchParameters: SearchParameters;
  outcome: AgentOutcome;
  steps: number;
}

/**
 * Everything the loop carries from one step to the next.
 */
export interface LoopState {
  messages: ChatCompletionMessageParam[];
  step: number;
  sources: SourceDocument[];
  searchParameters: SearchParameters;
}

export type StepResult =
  | { done: true; text: string; state: LoopState }
  | { done: false; state: LoopState };

interface ParsedCall<TCall> {
  raw: ToolCall;
  /** null when the model named a tool this handler does not have */
  call: TCall | null;
}

function callSignature(call: ToolCall): string {
  let args: unknown;
  try {
    args = call.arguments.trim() === '' ? {} : JSON.parse(call.arguments);
  } catch {
    // Unparseable arguments are compared verbatim; parsing rejects them right after
    args = call.arguments;
  }
  return `${call.name}:${canonicalJson(args)}`;
}

/**
 * Bounded tool-calling loop shared by every sub-agent.
 *
 * Each step asks the provider for the next action. A reply without tool calls
 * ends the loop; otherwise the calls are checked, executed against the
 * registry and their results appended as tool messages. Protocol violations
 * (duplicate calls in one step, malformed arguments) abort the turn. Tool
 * failures become tool results and the loop continues.
 */
export class AgentRunner<TCall extends { name: string }> {
  readonly name: string;
  private readonly provider: ChatCompletionProvider;
  private readonly registry: ToolRegistry<TCall>;
  private readonly systemPrompt: string;
  private readonly model: string;
  private readonly maxSteps: number;
  private readonly maxTokens: number;
  private readonly llmTimeoutMs: number;

  constructor(options: AgentRunnerOptions<TCall>) {
    this.name = options.name;
    this.provider = options.provider;
    this.registry = options.registry;
    this.systemPrompt = options.systemPrompt;
    this.model = options.model ?? config.openai.chatModel;
    this.maxSteps = options.maxSteps ?? config.agent.maxSteps;
    this.maxTokens = options.maxTokens ?? config.openai.maxTokens.agent;
    this.llmTimeoutMs = options.llmTimeoutMs ?? config.timeouts.llmMs;
  }

  initialState(invocation: AgentInvocation): LoopState {
    return {
      messages: [
        { role: 'system', content: this.systemPrompt },
        ...invocation.priorMessages,
        { role: 'user', content: invocation.query },
      ],
      step: 0,
      sources: [],
      searchParameters: {},
    };
  }

  async invoke(invocation: AgentInvocation): Promise<AgentResult> {
    const context: ToolContext = {
      sessionId: invocation.sessionId,
      query: invocation.query,
      minSimilarity: invocation.minSimilarity,
    };

    let state = this.initialState(invocation);

    while (state.step < this.maxSteps) {
      let response: OpenAiResponse;
      try {
        response = await this.provider.runWithTools({
          input: state.messages,
          tools: this.registry.definitions,
          model: this.model,
          maxTokens: this.maxTokens,
          timeoutMs: this.llmTimeoutMs,
          route: `agent.${this.name}`,
        });
      } catch (error) {
        if (isTimeoutError(error)) {
          logger.warn({ agent: this.name, step: state.step }, 'Model call timed out');
          return this.finish(state, TIMEOUT_FALLBACK_RESPONSE, 'timeout');
        }
        throw error;
      }

      const result = await this.step(state, response, context);
      if (result.done) {
        return this.finish(result.state, result.text, 'completed');
      }
      state = result.state;
    }

    logger.warn({ agent: this.name, maxSteps: this.maxSteps }, 'Agent exhausted its step budget');
    return this.finish(state, MAX_STEPS_FALLBACK_RESPONSE, 'max_steps');
  }

  /**
   * Apply one provider response to the loop state.
   */
  async step(state: LoopState, response: OpenAiResponse, context: ToolContext): Promise<StepResult> {
    if (response.toolCalls.length === 0) {
      const text = response.content?.trim() ? response.content : EMPTY_AGENT_RESPONSE;
      return { done: true, text, state: { ...state, step: state.step + 1 } };
    }

    const seen = new Set<string>();
    for (const toolCall of response.toolCalls) {
      const signature = callSignature(toolCall);
      if (seen.has(signature)) {
        logger.error({ agent: this.name, signature }, 'Duplicate tool call in one step');
        throw new DuplicateToolCallError(toolCall.name, signature);
      }
      seen.add(signature);
    }

    // Parse every call before running any, so a malformed call leaves no side effects
    const parsed: ParsedCall<TCall>[] = response.toolCalls.map((raw) => ({
      raw,
      call: this.registry.parse(raw.name, raw.arguments),
    }));

    const messages: ChatCompletionMessageParam[] = [
      ...state.messages,
      {
        role: 'assistant',
        content: response.content,
        tool_calls: response.toolCalls.map((tc) => ({
          id: tc.id,
          type: 'function' as const,
          function: { name: tc.name, arguments: tc.arguments },
        })),
      },
    ];
    const sources = [...state.sources];
    let searchParameters = state.searchParameters;

    for (const { raw, call } of parsed) {
      let output: string;

      if (call === null) {
        output = `Error: Unknown function '${raw.name}'`;
      } else {
        const captured = this.registry.captureSearchParameters?.(call, context);
        if (captured) {
          searchParameters = { ...searchParameters, ...captured };
        }

        try {
          const outcome = await this.registry.execute(call, context);
          output = outcome.output;
          sources.push(...(outcome.sources ?? []));
        } catch (error) {
          const appError = mapError(error);
          if (appError.isProtocolViolation) {
            throw error;
          }
          logger.warn({
            agent: this.name,
            tool: raw.name,
            category: appError.category,
            code: appError.code,
          }, 'Tool execution failed');
          output = this.registry.describeFailure(call, appError);
        }
      }

      if (config.debug) {
        logger.debug({ agent: this.name, step: state.step, tool: raw.name, output }, 'Tool result');
      }

      messages.push({ role: 'tool', content: output, tool_call_id: raw.id });
    }

    return {
      done: false,
      state: { messages, step: state.step + 1, sources, searchParameters },
    };
  }

  private finish(state: LoopState, responseText: string, outcome: AgentOutcome): AgentResult {
    return {
      responseText,
      sources: state.sources,
      searchParameters: state.searchParameters,
      outcome,
      steps: state.step,
    };
  }
}
