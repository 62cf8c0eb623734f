import { describe, it, expect, vi } from 'vitest';
import { createHandbookToolRegistry } from '../agent/generalInfo/handbookTools.js';
import { AppError } from '../errors/AppError.js';
import type { IVectorStore } from '../retrieval/types.js';
import { scored } from './helpers/fixtures.js';

const context = { sessionId: 'session_a', query: 'returns?', minSimilarity: 0.7 };

describe('handbook tool registry', () => {
  it('searches the handbook collection with the default k', async () => {
    const similaritySearchWithScore = vi.fn<IVectorStore['similaritySearchWithScore']>().mockResolvedValue([
      scored('Items can be returned within 30 days.', { handbook_name: 'Store Handbook', section: 'Returns' }, 0.1),
    ]);
    const registry = createHandbookToolRegistry({
      vectorStore: { similaritySearchWithScore },
      handbookCollection: 'general_handbook',
      searchTimeoutMs: 1000,
    });

    const call = registry.parse('retrieve_handbook_info', '{"query": "return window"}');
    if (!call) throw new Error('retrieve_handbook_info not registered');
    const outcome = await registry.execute(call, context);

    expect(similaritySearchWithScore).toHaveBeenCalledWith('general_handbook', 'return window', 3);
    expect(outcome.output).toBe('Source: Store Handbook\nSection: Returns\nContent: Items can be returned within 30 days.');
    expect(outcome.sources).toHaveLength(1);
  });

  it('knows only its own tool', () => {
    const registry = createHandbookToolRegistry({
      vectorStore: { similaritySearchWithScore: vi.fn() },
      handbookCollection: 'general_handbook',
      searchTimeoutMs: 1000,
    });

    expect(registry.parse('add_to_cart', '{}')).toBeNull();
    expect(registry.definitions.map((tool) => tool.name)).toEqual(['retrieve_handbook_info']);
  });

  it('describes timeouts for the model', () => {
    const registry = createHandbookToolRegistry({
      vectorStore: { similaritySearchWithScore: vi.fn() },
      handbookCollection: 'general_handbook',
      searchTimeoutMs: 1000,
    });
    const call = registry.parse('retrieve_handbook_info', '{"query": "x"}');
    if (!call) throw new Error('retrieve_handbook_info not registered');

    expect(registry.describeFailure(call, AppError.timeout('retrieve_handbook_info', 1000)))
      .toBe('Error: Handbook search timed out. Please try again.');
  });
});
