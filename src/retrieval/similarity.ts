import type { ScoredDocument, SourceDocument } from './types.js';

/**
 * Keep ranked results whose similarity (1 - distance) meets the threshold,
 * in rank order, stopping once k have been accepted.
 */
export function filterBySimilarityThreshold(
  results: ScoredDocument[],
  minSimilarity: number,
  k: number
): SourceDocument[] {
  const accepted: SourceDocument[] = [];
  for (const { document, distance } of results) {
    if (accepted.length >= k) {
      break;
    }
    const similarity = 1 - distance;
    if (similarity >= minSimilarity) {
      accepted.push({ document, similarity });
    }
  }
  return accepted;
}
