import { z } from 'zod';
import type { ToolCall } from '../../openai/OpenAiClient.js';
import { defineTool, parseToolArguments } from '../tools.js';

export type HandlerName = 'general_info' | 'order';

export type RoutingMode = 'direct' | 'single' | 'sequential' | 'parallel';

export const routingArgsSchema = z.object({
  query: z.string().min(1).describe('The part of the customer query this agent should handle'),
});

/** Routing function name -> handler */
const ROUTING_FUNCTIONS = {
  query_general_info: 'general_info',
  query_order_agent: 'order',
} as const satisfies Record<string, HandlerName>;

type RoutingFunctionName = keyof typeof ROUTING_FUNCTIONS;

/** Handlers whose repeated calls in one turn are merged into one */
const COLLAPSIBLE_HANDLERS: ReadonlySet<HandlerName> = new Set<HandlerName>(['order']);

export const routingToolDefinitions = [
  defineTool(
    'query_general_info',
    'Route to the general information agent: policies, FAQs, shipping and returns, company information.',
    routingArgsSchema
  ),
  defineTool(
    'query_order_agent',
    'Route to the order agent: product search, cart, shipping details, purchases, orders and vouchers.',
    routingArgsSchema
  ),
];

export interface RoutingCall {
  handler: HandlerName;
  query: string;
}

function isRoutingFunction(name: string): name is RoutingFunctionName {
  return Object.hasOwn(ROUTING_FUNCTIONS, name);
}

/**
 * Turn the provider's proposed routing calls into handler invocations.
 * Unknown function names are dropped; malformed arguments throw.
 */
export function parseRoutingCalls(toolCalls: ToolCall[]): RoutingCall[] {
  const calls: RoutingCall[] = [];
  for (const { name, arguments: rawArgs } of toolCalls) {
    if (!isRoutingFunction(name)) {
      continue;
    }
    const args = parseToolArguments(name, rawArgs, routingArgsSchema);
    calls.push({ handler: ROUTING_FUNCTIONS[name], query: args.query });
  }
  return calls;
}

/**
 * Merge repeated calls to a collapsible handler into one call at the
 * position of its first occurrence, carrying the original query.
 */
export function collapseRoutingCalls(calls: RoutingCall[], originalQuery: string): RoutingCall[] {
  const collapsed: RoutingCall[] = [];
  const seen = new Set<HandlerName>();

  for (const call of calls) {
    if (!COLLAPSIBLE_HANDLERS.has(call.handler)) {
      collapsed.push(call);
      continue;
    }
    if (seen.has(call.handler)) {
      continue;
    }
    seen.add(call.handler);
    const repeated = calls.filter((other) => other.handler === call.handler).length > 1;
    collapsed.push(repeated ? { handler: call.handler, query: originalQuery } : call);
  }

  return collapsed;
}

export function classifyRoutingMode(calls: RoutingCall[]): RoutingMode {
  if (calls.length === 0) {
    return 'direct';
  }
  if (calls.length === 1) {
    return 'single';
  }
  const distinct = new Set(calls.map((call) => call.handler));
  return distinct.size > 1 ? 'parallel' : 'sequential';
}
