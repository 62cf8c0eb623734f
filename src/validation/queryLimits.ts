import { AppError } from '../errors/index.js';

export interface QueryLimits {
  maxChars: number;
}

/**
 * Reject queries longer than the configured limit before any model call.
 * @throws AppError (413) when the query is too long
 */
export function enforceQueryLimits(query: string, limits: QueryLimits): void {
  if (query.length > limits.maxChars) {
    throw AppError.payloadTooLarge('Query too long', {
      maxChars: limits.maxChars,
      actualChars: query.length,
    });
  }
}
