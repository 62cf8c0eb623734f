import type { DocumentMetadata } from '../db/schema.js';

export type { DocumentMetadata };

export interface RetrievedDocument {
  pageContent: string;
  metadata: DocumentMetadata;
}

/** Raw store result: smaller distance means closer */
export interface ScoredDocument {
  document: RetrievedDocument;
  distance: number;
}

/** Result kept after threshold filtering; similarity = 1 - distance */
export interface SourceDocument {
  document: RetrievedDocument;
  similarity: number;
}

export type EqualityFilter = Record<string, string | number | boolean>;

export interface IVectorStore {
  /**
   * Ranked nearest neighbours of the query within one collection.
   * The filter is an exact match on metadata keys.
   */
  similaritySearchWithScore(
    collection: string,
    query: string,
    k: number,
    filter?: EqualityFilter
  ): Promise<ScoredDocument[]>;
}

export function isProductSource(source: SourceDocument): boolean {
  const productId = source.document.metadata.product_id;
  return productId !== undefined && productId !== null && productId !== '';
}
