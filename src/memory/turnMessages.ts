import { isProductSource } from '../retrieval/types.js';
import type { ConversationTurn, HistoryMessage } from './IConversationMemory.js';

export const PREVIOUS_RESULTS_HEADER = '[Previous search results with product_ids:]';

function field(value: string | number | boolean | null | undefined): string {
  return value === undefined || value === null ? 'N/A' : String(value);
}

/**
 * Expand stored turns into user/assistant messages. Product results are
 * appended to the assistant reply so later turns can refer to them by id
 * ("add the second one to my cart").
 */
export function turnsToMessages(turns: ConversationTurn[]): HistoryMessage[] {
  const messages: HistoryMessage[] = [];

  for (const turn of turns) {
    messages.push({ role: 'user', content: turn.query });

    const productParts = turn.sources
      .filter(isProductSource)
      .map(({ document: { metadata } }) => [
        `Product ID: ${field(metadata.product_id)}`,
        `Brand: ${field(metadata.brand)}`,
        `Category: ${field(metadata.category)}`,
        `Price: $${field(metadata.price)}`,
      ].join('\n'));

    const content = productParts.length > 0
      ? `${turn.response}\n\n${PREVIOUS_RESULTS_HEADER}\n${productParts.join('\n\n---\n\n')}`
      : turn.response;

    messages.push({ role: 'assistant', content });
  }

  return messages;
}
