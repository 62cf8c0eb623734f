import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';
import pino from 'pino';
import { config } from '../../config.js';
import type { IQualityEvaluator } from '../../evaluation/IQualityEvaluator.js';
import { isTimeoutError } from '../../http/timeout.js';
import type { IConversationMemory } from '../../memory/IConversationMemory.js';
import type { ChatCompletionProvider, OpenAiResponse } from '../../openai/OpenAiClient.js';
import { isProductSource, type SourceDocument } from '../../retrieval/types.js';
import type { AgentInvocation, AgentResult } from '../agentRunner.js';
import {
  EMPTY_DIRECT_RESPONSE,
  ORCHESTRATOR_SYSTEM_PROMPT,
  SYNTHESIS_SYSTEM_PROMPT,
  TIMEOUT_FALLBACK_RESPONSE,
} from '../prompts.js';
import type { SearchParameters } from '../tools.js';
import {
  classifyRoutingMode,
  collapseRoutingCalls,
  parseRoutingCalls,
  routingToolDefinitions,
  type HandlerName,
  type RoutingCall,
  type RoutingMode,
} from './routing.js';

const logger = pino({ name: 'Orchestrator' });

/** Anything that runs a handler's tool loop */
export interface SubAgent {
  invoke(invocation: AgentInvocation): Promise<AgentResult>;
}

export interface OrchestratorOptions {
  provider: ChatCompletionProvider;
  memory: IConversationMemory;
  evaluator: IQualityEvaluator;
  handlers: Record<HandlerName, SubAgent>;
  model?: string;
  maxTokens?: number;
  llmTimeoutMs?: number;
}

export interface RouteResult {
  responseText: string;
  routingMode: RoutingMode;
  handlersUsed: HandlerName[];
  sources: SourceDocument[];
  searchParameters: SearchParameters;
}

interface HandlerOutput {
  handler: HandlerName;
  result: AgentResult;
}

/**
 * Routes a customer query to the sub-agents, runs them in the pattern the
 * routing call implies and produces the final reply.
 */
export class Orchestrator {
  private readonly provider: ChatCompletionProvider;
  private readonly memory: IConversationMemory;
  private readonly evaluator: IQualityEvaluator;
  private readonly handlers: Record<HandlerName, SubAgent>;
  private readonly model: string;
  private readonly maxTokens: number;
  private readonly llmTimeoutMs: number;

  constructor(options: OrchestratorOptions) {
    this.provider = options.provider;
    this.memory = options.memory;
    this.evaluator = options.evaluator;
    this.handlers = options.handlers;
    this.model = options.model ?? config.openai.chatModel;
    this.maxTokens = options.maxTokens ?? config.openai.maxTokens.orchestrator;
    this.llmTimeoutMs = options.llmTimeoutMs ?? config.timeouts.llmMs;
  }

  async route(query: string, sessionId: string, minSimilarity: number): Promise<RouteResult> {
    const history: ChatCompletionMessageParam[] = await this.memory.getMessages(sessionId);

    let routingResponse: OpenAiResponse;
    try {
      routingResponse = await this.provider.runWithTools({
        input: [
          { role: 'system', content: ORCHESTRATOR_SYSTEM_PROMPT },
          ...history,
          { role: 'user', content: query },
        ],
        tools: routingToolDefinitions,
        model: this.model,
        maxTokens: this.maxTokens,
        timeoutMs: this.llmTimeoutMs,
        route: 'orchestrator.route',
      });
    } catch (error) {
      if (!isTimeoutError(error)) {
        throw error;
      }
      logger.warn({ sessionId }, 'Routing call timed out');
      return this.complete(query, sessionId, {
        responseText: TIMEOUT_FALLBACK_RESPONSE,
        routingMode: 'direct',
        handlersUsed: [],
        sources: [],
        searchParameters: {},
      });
    }

    const calls = collapseRoutingCalls(parseRoutingCalls(routingResponse.toolCalls), query);
    const routingMode = classifyRoutingMode(calls);

    if (config.debug) {
      logger.debug({ sessionId, routingMode, calls }, 'Routing decided');
    }

    if (routingMode === 'direct') {
      const text = routingResponse.content?.trim();
      return this.complete(query, sessionId, {
        responseText: text ? text : EMPTY_DIRECT_RESPONSE,
        routingMode,
        handlersUsed: [],
        sources: [],
        searchParameters: {},
      });
    }

    const invocation = { sessionId, minSimilarity, history };
    const outputs = routingMode === 'parallel'
      ? await Promise.all(calls.map((call) => this.runHandler(call, invocation, [])))
      : await this.runSequentially(calls, invocation);

    const sources: SourceDocument[] = [];
    let searchParameters: SearchParameters = {};
    for (const { result } of outputs) {
      sources.push(...result.sources);
      searchParameters = { ...searchParameters, ...result.searchParameters };
    }
    const handlersUsed = [...new Set(outputs.map((output) => output.handler))];

    const [only] = outputs;
    const responseText = routingMode === 'single' && only
      ? only.result.responseText
      : await this.synthesize(query, history, outputs);

    return this.complete(query, sessionId, {
      responseText,
      routingMode,
      handlersUsed,
      sources,
      searchParameters,
    });
  }

  private async runSequentially(
    calls: RoutingCall[],
    invocation: { sessionId: string; minSimilarity: number; history: ChatCompletionMessageParam[] }
  ): Promise<HandlerOutput[]> {
    const outputs: HandlerOutput[] = [];
    const carried: ChatCompletionMessageParam[] = [];
    for (const call of calls) {
      const output = await this.runHandler(call, invocation, carried);
      outputs.push(output);
      carried.push(
        { role: 'user', content: call.query },
        { role: 'assistant', content: output.result.responseText }
      );
    }
    return outputs;
  }

  private async runHandler(
    call: RoutingCall,
    invocation: { sessionId: string; minSimilarity: number; history: ChatCompletionMessageParam[] },
    carried: ChatCompletionMessageParam[]
  ): Promise<HandlerOutput> {
    const result = await this.handlers[call.handler].invoke({
      query: call.query,
      sessionId: invocation.sessionId,
      minSimilarity: invocation.minSimilarity,
      priorMessages: [...invocation.history, ...carried],
    });
    logger.info({
      sessionId: invocation.sessionId,
      handler: call.handler,
      outcome: result.outcome,
      steps: result.steps,
    }, 'Handler finished');
    return { handler: call.handler, result };
  }

  private async synthesize(
    query: string,
    history: ChatCompletionMessageParam[],
    outputs: HandlerOutput[]
  ): Promise<string> {
    const results = outputs
      .map(({ handler, result }) => `[${handler}]\n${result.responseText}`)
      .join('\n\n');

    try {
      const response = await this.provider.runWithTools({
        input: [
          { role: 'system', content: SYNTHESIS_SYSTEM_PROMPT },
          ...history,
          { role: 'user', content: `${query}\n\nResults:\n${results}` },
        ],
        model: this.model,
        maxTokens: this.maxTokens,
        timeoutMs: this.llmTimeoutMs,
        route: 'orchestrator.synthesize',
      });
      return response.content?.trim()
        ? response.content
        : outputs.map(({ result }) => result.responseText).join('\n\n');
    } catch (error) {
      if (!isTimeoutError(error)) {
        throw error;
      }
      logger.warn({ handlers: outputs.map((output) => output.handler) }, 'Synthesis call timed out');
      return TIMEOUT_FALLBACK_RESPONSE;
    }
  }

  /**
   * Store the turn and fire the quality evaluation without waiting for it.
   */
  private async complete(query: string, sessionId: string, result: RouteResult): Promise<RouteResult> {
    await this.memory.addTurn(sessionId, {
      query,
      response: result.responseText,
      sources: result.sources.filter(isProductSource),
    });

    void this.evaluator
      .evaluate({ query, response: result.responseText, handlersUsed: result.handlersUsed, sessionId })
      .catch((error: unknown) => {
        logger.warn({
          sessionId,
          error: error instanceof Error ? error.message : String(error),
        }, 'Quality evaluation failed');
      });

    return result;
  }
}
