import { Redis } from 'ioredis';
import pino from 'pino';
import { z } from 'zod';
import type { ConversationTurn, HistoryMessage, IConversationMemory } from './IConversationMemory.js';
import { turnsToMessages } from './turnMessages.js';

const logger = pino({ name: 'RedisConversationMemory' });

const metadataValue = z.union([z.string(), z.number(), z.boolean(), z.null()]);

const storedTurnSchema = z.object({
  query: z.string(),
  response: z.string(),
  sources: z.array(z.object({
    document: z.object({
      pageContent: z.string(),
      metadata: z.record(z.string(), metadataValue),
    }),
    similarity: z.number(),
  })),
});

export interface RedisConversationMemoryOptions {
  redisUrl: string;
  prefix?: string;
  maxTurns: number;
}

/**
 * Conversation memory kept in a Redis list per session, trimmed to the
 * last N turns on every write.
 */
export class RedisConversationMemory implements IConversationMemory {
  private readonly redis: Redis;
  private readonly prefix: string;
  private readonly maxTurns: number;

  constructor(options: RedisConversationMemoryOptions) {
    this.redis = new Redis(options.redisUrl, {
      lazyConnect: false,
      maxRetriesPerRequest: 3,
      retryStrategy: (times: number) => {
        if (times > 3) {
          return null;
        }
        return Math.min(times * 100, 3000);
      },
    });
    this.prefix = options.prefix ?? 'agent:memory:';
    this.maxTurns = options.maxTurns;

    this.redis.on('error', (err: Error) => {
      logger.error({ error: err.message }, 'Redis connection error');
    });
  }

  private getFullKey(sessionId: string): string {
    return `${this.prefix}${sessionId}`;
  }

  async addTurn(sessionId: string, turn: ConversationTurn): Promise<void> {
    const fullKey = this.getFullKey(sessionId);
    await this.redis
      .multi()
      .rpush(fullKey, JSON.stringify(turn))
      .ltrim(fullKey, -this.maxTurns, -1)
      .exec();
  }

  async getHistory(sessionId: string): Promise<ConversationTurn[]> {
    const fullKey = this.getFullKey(sessionId);
    const raw = await this.redis.lrange(fullKey, 0, -1);

    const turns: ConversationTurn[] = [];
    for (const entry of raw) {
      try {
        turns.push(storedTurnSchema.parse(JSON.parse(entry)));
      } catch (parseError) {
        // One poisoned entry should not hide the rest of the history
        logger.warn({
          key: fullKey,
          error: parseError instanceof Error ? parseError.message : String(parseError),
        }, 'Skipping unreadable conversation turn');
      }
    }
    return turns;
  }

  async getMessages(sessionId: string): Promise<HistoryMessage[]> {
    return turnsToMessages(await this.getHistory(sessionId));
  }

  async ping(): Promise<boolean> {
    try {
      const result = await this.redis.ping();
      return result === 'PONG';
    } catch (error) {
      logger.warn({ error: error instanceof Error ? error.message : String(error) }, 'Redis ping failed');
      return false;
    }
  }

  async close(): Promise<void> {
    try {
      await this.redis.quit();
    } catch (error) {
      logger.error({ error: error instanceof Error ? error.message : String(error) }, 'Failed to disconnect from Redis');
    }
  }
}
