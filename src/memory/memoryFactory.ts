import pino from 'pino';
import { config } from '../config.js';
import type { IConversationMemory } from './IConversationMemory.js';
import { InMemoryConversationMemory } from './InMemoryConversationMemory.js';
import { RedisConversationMemory } from './RedisConversationMemory.js';

const logger = pino({ name: 'memoryFactory' });

export interface ConversationMemoryFactoryResult {
  memory: IConversationMemory;
  type: 'memory' | 'redis';
}

export async function createConversationMemory(): Promise<ConversationMemoryFactoryResult> {
  const maxTurns = config.memory.maxTurns;

  if (config.memory.store === 'redis') {
    const redisUrl = config.memory.redis.url;
    if (!redisUrl) {
      throw new Error(
        'MEMORY_STORE=redis requires REDIS_URL to be set. ' +
        'Example: REDIS_URL=redis://localhost:6379'
      );
    }

    const redisMemory = new RedisConversationMemory({
      redisUrl,
      prefix: config.memory.redis.prefix,
      maxTurns,
    });

    const isConnected = await redisMemory.ping();
    if (!isConnected) {
      await redisMemory.close();
      throw new Error(
        `Failed to connect to Redis at ${redisUrl}. ` +
        'Ensure Redis is running and the URL is correct.'
      );
    }

    logger.info({ prefix: config.memory.redis.prefix }, 'Using Redis conversation memory');
    return { memory: redisMemory, type: 'redis' };
  }

  logger.info('Using in-memory conversation memory');
  return { memory: new InMemoryConversationMemory({ maxTurns }), type: 'memory' };
}
