import { filterBySimilarityThreshold } from './similarity.js';
import type { EqualityFilter, IVectorStore, RetrievedDocument, SourceDocument } from './types.js';

export interface ProductSearchParams {
  query: string;
  k: number;
  category?: string;
  brand?: string;
  min_price?: number;
  max_price?: number;
  is_featured?: boolean;
}

export interface RetrievalResult {
  /** Serialized results handed back to the model */
  text: string;
  sources: SourceDocument[];
}

export const NO_PRODUCTS_FOUND = 'No products found matching your criteria.';

/** Over-fetch factor when price bounds will discard some results client-side */
const PRICE_FILTER_FETCH_MULTIPLIER = 3;

function metadataText(document: RetrievedDocument, key: string): string {
  const value = document.metadata[key];
  return value === undefined || value === null ? 'N/A' : String(value);
}

/**
 * Price bounds are applied after retrieval because the store only filters on equality.
 * A product without a price fails a minimum bound; an unparseable price passes.
 */
export function passesPriceFilter(document: RetrievedDocument, minPrice?: number, maxPrice?: number): boolean {
  const raw = document.metadata.price;
  if (raw === undefined || raw === null || raw === '') {
    return minPrice === undefined;
  }
  const price = typeof raw === 'number' ? raw : parseFloat(String(raw));
  if (Number.isNaN(price)) {
    return true;
  }
  if (minPrice !== undefined && price < minPrice) {
    return false;
  }
  if (maxPrice !== undefined && price > maxPrice) {
    return false;
  }
  return true;
}

export function serializeProducts(sources: SourceDocument[]): string {
  if (sources.length === 0) {
    return NO_PRODUCTS_FOUND;
  }
  return sources
    .map(({ document }) => [
      `Product ID: ${metadataText(document, 'product_id')}`,
      `Brand: ${metadataText(document, 'brand')}`,
      `Category: ${metadataText(document, 'category')}`,
      `Price: $${metadataText(document, 'price')}`,
      `Content: ${document.pageContent}`,
    ].join('\n'))
    .join('\n\n');
}

export async function executeProductSearch(
  vectorStore: IVectorStore,
  collection: string,
  params: ProductSearchParams,
  minSimilarity: number
): Promise<RetrievalResult> {
  const filter: EqualityFilter = {};
  if (params.category) filter.category = params.category;
  if (params.brand) filter.brand = params.brand;
  if (params.is_featured !== undefined) filter.is_featured = params.is_featured;

  const hasPriceFilter = params.min_price !== undefined || params.max_price !== undefined;
  const fetchK = hasPriceFilter ? params.k * PRICE_FILTER_FETCH_MULTIPLIER : params.k;

  const ranked = await vectorStore.similaritySearchWithScore(
    collection,
    params.query,
    fetchK,
    Object.keys(filter).length > 0 ? filter : undefined
  );

  let sources = filterBySimilarityThreshold(ranked, minSimilarity, fetchK);

  if (hasPriceFilter) {
    sources = sources
      .filter(({ document }) => passesPriceFilter(document, params.min_price, params.max_price))
      .slice(0, params.k);
  }

  return { text: serializeProducts(sources), sources };
}
