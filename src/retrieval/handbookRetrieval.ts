import { filterBySimilarityThreshold } from './similarity.js';
import type { RetrievalResult } from './productSearch.js';
import type { IVectorStore } from './types.js';

export const NO_HANDBOOK_INFO_FOUND = 'No relevant information found.';

export async function executeHandbookRetrieval(
  vectorStore: IVectorStore,
  collection: string,
  query: string,
  k: number,
  minSimilarity: number
): Promise<RetrievalResult> {
  const ranked = await vectorStore.similaritySearchWithScore(collection, query, k);
  const sources = filterBySimilarityThreshold(ranked, minSimilarity, k);

  const text = sources
    .map(({ document }) => {
      const { metadata } = document;
      const source = metadata.handbook_name ?? 'Handbook';
      const section = [metadata.section, metadata.subsection]
        .filter((part) => part !== undefined && part !== null && part !== '')
        .join(' ');
      return `Source: ${String(source)}\nSection: ${section}\nContent: ${document.pageContent}`;
    })
    .join('\n\n');

  return { text: text || NO_HANDBOOK_INFO_FOUND, sources };
}
