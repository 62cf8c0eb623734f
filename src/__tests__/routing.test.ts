import { describe, it, expect } from 'vitest';
import {
  classifyRoutingMode,
  collapseRoutingCalls,
  parseRoutingCalls,
  routingToolDefinitions,
} from '../agent/orchestrator/routing.js';
import { MalformedToolArgsError } from '../errors/protocolErrors.js';
import { toolCall } from './helpers/fixtures.js';

describe('routing tool catalog', () => {
  it('offers one routing function per handler', () => {
    expect(routingToolDefinitions.map((tool) => tool.name)).toEqual(['query_general_info', 'query_order_agent']);
  });
});

describe('parseRoutingCalls', () => {
  it('maps routing functions to handlers and ignores unknown names', () => {
    const calls = parseRoutingCalls([
      toolCall('query_order_agent', { query: 'find shoes' }),
      toolCall('query_weather', { query: 'rain?' }),
      toolCall('query_general_info', { query: 'return policy' }),
    ]);

    expect(calls).toEqual([
      { handler: 'order', query: 'find shoes' },
      { handler: 'general_info', query: 'return policy' },
    ]);
  });

  it('throws on malformed routing arguments', () => {
    expect(() => parseRoutingCalls([toolCall('query_order_agent', '{"query":')])).toThrow(MalformedToolArgsError);
    expect(() => parseRoutingCalls([toolCall('query_order_agent', {})])).toThrow(MalformedToolArgsError);
  });
});

describe('collapseRoutingCalls', () => {
  it('merges repeated order calls into the first position with the original query', () => {
    const collapsed = collapseRoutingCalls([
      { handler: 'general_info', query: 'shipping times' },
      { handler: 'order', query: 'add shoes' },
      { handler: 'order', query: 'then buy them' },
    ], 'add shoes and buy them, also shipping times?');

    expect(collapsed).toEqual([
      { handler: 'general_info', query: 'shipping times' },
      { handler: 'order', query: 'add shoes and buy them, also shipping times?' },
    ]);
  });

  it('keeps a single order call untouched', () => {
    const calls = [{ handler: 'order' as const, query: 'add shoes' }];
    expect(collapseRoutingCalls(calls, 'original')).toEqual(calls);
  });

  it('does not collapse general info calls', () => {
    const calls = [
      { handler: 'general_info' as const, query: 'returns' },
      { handler: 'general_info' as const, query: 'warranty' },
    ];
    expect(collapseRoutingCalls(calls, 'original')).toEqual(calls);
  });
});

describe('classifyRoutingMode', () => {
  it('classifies by call count and distinct handlers', () => {
    expect(classifyRoutingMode([])).toBe('direct');
    expect(classifyRoutingMode([{ handler: 'order', query: 'a' }])).toBe('single');
    expect(classifyRoutingMode([
      { handler: 'general_info', query: 'a' },
      { handler: 'general_info', query: 'b' },
    ])).toBe('sequential');
    expect(classifyRoutingMode([
      { handler: 'general_info', query: 'a' },
      { handler: 'order', query: 'b' },
    ])).toBe('parallel');
  });
});
