import type { CartStore } from '../cart/CartStore.js';
import type { ICommerceStore } from '../commerce/ICommerceStore.js';
import type { PurchaseService } from '../commerce/PurchaseService.js';
import type { CatalogFacets } from '../commerce/types.js';
import { config } from '../config.js';
import type { ChatCompletionProvider } from '../openai/OpenAiClient.js';
import type { IVectorStore } from '../retrieval/types.js';
import { AgentRunner } from './agentRunner.js';
import { createHandbookToolRegistry, type HandbookToolCall } from './generalInfo/handbookTools.js';
import type { OrderToolCall } from './order/orderSchemas.js';
import { createOrderToolRegistry } from './order/orderTools.js';
import { GENERAL_INFO_SYSTEM_PROMPT, ORDER_AGENT_SYSTEM_PROMPT } from './prompts.js';

export interface AgentDependencies {
  provider: ChatCompletionProvider;
  vectorStore: IVectorStore;
  cartStore: CartStore;
  commerceStore: ICommerceStore;
  purchaseService: PurchaseService;
  catalogFacets: CatalogFacets;
}

export function createOrderAgent(deps: AgentDependencies): AgentRunner<OrderToolCall> {
  return new AgentRunner({
    name: 'order',
    provider: deps.provider,
    systemPrompt: ORDER_AGENT_SYSTEM_PROMPT,
    registry: createOrderToolRegistry({
      cartStore: deps.cartStore,
      commerceStore: deps.commerceStore,
      purchaseService: deps.purchaseService,
      vectorStore: deps.vectorStore,
      productCollection: config.retrieval.productCollection,
      catalogFacets: deps.catalogFacets,
      timeouts: {
        dbMs: config.timeouts.dbMs,
        searchMs: config.timeouts.searchMs,
        purchaseMs: config.timeouts.purchaseMs,
        ordersMs: config.timeouts.ordersMs,
      },
    }),
  });
}

export function createGeneralInfoAgent(
  deps: Pick<AgentDependencies, 'provider' | 'vectorStore'>
): AgentRunner<HandbookToolCall> {
  return new AgentRunner({
    name: 'general_info',
    provider: deps.provider,
    systemPrompt: GENERAL_INFO_SYSTEM_PROMPT,
    registry: createHandbookToolRegistry({
      vectorStore: deps.vectorStore,
      handbookCollection: config.retrieval.handbookCollection,
      searchTimeoutMs: config.timeouts.searchMs,
    }),
  });
}
