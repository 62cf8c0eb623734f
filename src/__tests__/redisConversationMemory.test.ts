import { describe, it, expect, vi, afterEach } from 'vitest';
import RedisMock from 'ioredis-mock';

vi.mock('ioredis', () => ({
  Redis: RedisMock,
}));

import { RedisConversationMemory } from '../memory/RedisConversationMemory.js';

describe('RedisConversationMemory', () => {
  let memory: RedisConversationMemory | undefined;

  afterEach(async () => {
    if (memory) {
      await memory.close();
      memory = undefined;
    }
  });

  it('stores turns and reads them back oldest first', async () => {
    memory = new RedisConversationMemory({ redisUrl: 'redis://localhost:6379', prefix: 'test:order:', maxTurns: 10 });
    const sources = [
      { document: { pageContent: 'Desk lamp', metadata: { product_id: 5, price: 30 } }, similarity: 0.75 },
    ];

    await memory.addTurn('s1', { query: 'lamps?', response: 'One lamp found.', sources });
    await memory.addTurn('s1', { query: 'thanks', response: 'You are welcome.', sources: [] });

    expect(await memory.getHistory('s1')).toEqual([
      { query: 'lamps?', response: 'One lamp found.', sources },
      { query: 'thanks', response: 'You are welcome.', sources: [] },
    ]);
  });

  it('trims the list to maxTurns', async () => {
    memory = new RedisConversationMemory({ redisUrl: 'redis://localhost:6379', prefix: 'test:trim:', maxTurns: 2 });

    for (const query of ['q1', 'q2', 'q3']) {
      await memory.addTurn('s1', { query, response: `r-${query}`, sources: [] });
    }

    const history = await memory.getHistory('s1');
    expect(history.map((t) => t.query)).toEqual(['q2', 'q3']);
  });

  it('skips entries that cannot be parsed', async () => {
    const redis = new RedisMock('redis://localhost:6379');
    await redis.rpush('test:poison:s1', 'not json', JSON.stringify({ query: 'q', response: 'r', sources: [] }));
    memory = new RedisConversationMemory({ redisUrl: 'redis://localhost:6379', prefix: 'test:poison:', maxTurns: 5 });

    expect(await memory.getHistory('s1')).toEqual([{ query: 'q', response: 'r', sources: [] }]);
    await redis.quit();
  });

  it('answers ping', async () => {
    memory = new RedisConversationMemory({ redisUrl: 'redis://localhost:6379', prefix: 'test:ping:', maxTurns: 5 });

    expect(await memory.ping()).toBe(true);
  });
});
