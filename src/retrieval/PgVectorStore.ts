import { and, asc, cosineDistance, eq, sql, type SQL } from 'drizzle-orm';
import pino from 'pino';
import { config } from '../config.js';
import type { AppDb } from '../db/client.js';
import { documents } from '../db/schema.js';
import { AppError, mapError } from '../errors/index.js';
import type { EmbeddingProvider } from '../openai/OpenAiClient.js';
import type { EqualityFilter, IVectorStore, ScoredDocument } from './types.js';

const logger = pino({ name: 'PgVectorStore' });

/**
 * Similarity search over the pgvector `documents` table.
 * Distance is cosine distance, so similarity = 1 - distance.
 */
export class PgVectorStore implements IVectorStore {
  constructor(
    private readonly db: AppDb,
    private readonly embeddings: EmbeddingProvider
  ) {}

  async similaritySearchWithScore(
    collection: string,
    query: string,
    k: number,
    filter?: EqualityFilter
  ): Promise<ScoredDocument[]> {
    try {
      return await this.search(collection, query, k, filter);
    } catch (error) {
      const appError = mapError(error);
      if (appError.isTimeout || appError.category === 'RETRIEVAL') {
        throw appError;
      }
      const message = error instanceof Error ? error.message : String(error);
      logger.error({ collection, k, code: appError.code, error: message }, 'Vector search failed');
      throw AppError.retrieval(message, appError);
    }
  }

  private async search(
    collection: string,
    query: string,
    k: number,
    filter?: EqualityFilter
  ): Promise<ScoredDocument[]> {
    const queryEmbedding = await this.embeddings.embed(query);
    const distance = sql<number>`${cosineDistance(documents.embedding, queryEmbedding)}`;

    const conditions: SQL[] = [eq(documents.collection, collection)];
    if (filter && Object.keys(filter).length > 0) {
      conditions.push(sql`${documents.metadata} @> ${JSON.stringify(filter)}::jsonb`);
    }

    const rows = await this.db
      .select({
        content: documents.content,
        metadata: documents.metadata,
        distance,
      })
      .from(documents)
      .where(and(...conditions))
      .orderBy(asc(distance))
      .limit(k);

    if (config.debug) {
      logger.debug({ collection, k, filter, returned: rows.length }, 'Vector search completed');
    }

    return rows.map((row) => ({
      document: { pageContent: row.content, metadata: row.metadata },
      // numeric results can come back from the driver as strings
      distance: Number(row.distance),
    }));
  }
}
