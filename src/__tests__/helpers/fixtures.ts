import { vi } from 'vitest';
import type { Product, ShippingInfo, Voucher } from '../../commerce/types.js';
import type { OpenAiResponse, RunWithToolsInput, ToolCall } from '../../openai/OpenAiClient.js';
import type { DocumentMetadata, ScoredDocument } from '../../retrieval/types.js';

export function makeProduct(overrides: Partial<Product> = {}): Product {
  return {
    id: 1,
    name: 'Trail Runner Shoe',
    sku: 'SKU-1',
    description: 'Lightweight running shoe',
    priceCents: 2299,
    stockQuantity: 10,
    category: 'Clothing',
    brand: 'Acme',
    primaryImage: null,
    isActive: true,
    isFeatured: false,
    ...overrides,
  };
}

export function makeVoucher(overrides: Partial<Voucher> = {}): Voucher {
  return {
    code: 'VOUCHER-TEST0001',
    amountCents: 200000,
    isUsed: false,
    generatedBySession: 'session_a',
    usedBySession: null,
    createdAt: new Date('2026-01-01T00:00:00Z'),
    usedAt: null,
    expiresAt: null,
    ...overrides,
  };
}

export function makeShipping(sessionId: string, overrides: Partial<ShippingInfo> = {}): ShippingInfo {
  return {
    sessionId,
    fullName: 'Jane Doe',
    address: '1 Main St',
    city: 'Springfield',
    zipCode: '12345',
    createdAt: new Date('2026-01-01T00:00:00Z'),
    updatedAt: new Date('2026-01-01T00:00:00Z'),
    ...overrides,
  };
}

export function scored(pageContent: string, metadata: DocumentMetadata, distance: number): ScoredDocument {
  return { document: { pageContent, metadata }, distance };
}

export function textResponse(content: string | null): OpenAiResponse {
  return { content, toolCalls: [] };
}

let callCounter = 0;

export function toolCall(name: string, args: unknown): ToolCall {
  callCounter += 1;
  return {
    id: `call_${callCounter}`,
    name,
    arguments: typeof args === 'string' ? args : JSON.stringify(args),
  };
}

export function toolResponse(...calls: ToolCall[]): OpenAiResponse {
  return { content: null, toolCalls: calls };
}

/**
 * A provider whose runWithTools is a vi.fn; queue responses with mockResolvedValueOnce.
 */
export function createMockProvider() {
  return {
    runWithTools: vi.fn<(options: RunWithToolsInput) => Promise<OpenAiResponse>>(),
  };
}
