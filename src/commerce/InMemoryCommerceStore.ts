import { AppError } from '../errors/AppError.js';
import type { CommerceTransaction, ICommerceStore, UpsertShippingResult } from './ICommerceStore.js';
import type {
  CatalogFacets,
  NewOrder,
  NewVoucher,
  Order,
  Product,
  ShippingDetails,
  ShippingInfo,
  Voucher,
} from './types.js';

function distinctSorted(values: Array<string | null>): string[] {
  const present = values.filter((value): value is string => typeof value === 'string' && value.length > 0);
  return [...new Set(present)].sort();
}

export interface InMemoryCommerceSeed {
  products?: Product[];
  vouchers?: Voucher[];
  shipping?: ShippingInfo[];
}

interface StagedWrites {
  orders: Order[];
  voucherUsage: Array<{ code: string; sessionId: string; usedAt: Date }>;
}

/**
 * In-process commerce store with the same transactional contract as the
 * Postgres store: writes made through a transaction are staged and applied
 * together on commit, the order voucher code is unique at commit time, and
 * a throw inside the transaction discards everything staged.
 */
export class InMemoryCommerceStore implements ICommerceStore {
  private readonly products = new Map<number, Product>();
  private readonly vouchers = new Map<string, Voucher>();
  private readonly shipping = new Map<string, ShippingInfo>();
  private orders: Order[] = [];
  private nextOrderId = 1;

  constructor(seed: InMemoryCommerceSeed = {}) {
    for (const product of seed.products ?? []) {
      this.products.set(product.id, structuredClone(product));
    }
    for (const voucher of seed.vouchers ?? []) {
      this.vouchers.set(voucher.code, structuredClone(voucher));
    }
    for (const info of seed.shipping ?? []) {
      this.shipping.set(info.sessionId, structuredClone(info));
    }
  }

  async getProduct(productId: number): Promise<Product | null> {
    const product = this.products.get(productId);
    return product ? structuredClone(product) : null;
  }

  async getCatalogFacets(): Promise<CatalogFacets> {
    const active = [...this.products.values()].filter((product) => product.isActive);
    return {
      categories: distinctSorted(active.map((product) => product.category)),
      brands: distinctSorted(active.map((product) => product.brand)),
    };
  }

  async getShippingInfo(sessionId: string): Promise<ShippingInfo | null> {
    const info = this.shipping.get(sessionId);
    return info ? structuredClone(info) : null;
  }

  async upsertShippingInfo(sessionId: string, details: ShippingDetails): Promise<UpsertShippingResult> {
    const now = new Date();
    const existing = this.shipping.get(sessionId);
    const info: ShippingInfo = {
      sessionId,
      ...details,
      createdAt: existing?.createdAt ?? now,
      updatedAt: now,
    };
    this.shipping.set(sessionId, info);
    return { info: structuredClone(info), created: !existing };
  }

  async updateShippingInfo(sessionId: string, patch: Partial<ShippingDetails>): Promise<ShippingInfo | null> {
    const existing = this.shipping.get(sessionId);
    if (!existing) {
      return null;
    }
    const updated: ShippingInfo = { ...existing, ...patch, updatedAt: new Date() };
    this.shipping.set(sessionId, updated);
    return structuredClone(updated);
  }

  async getOrder(sessionId: string, orderId: number): Promise<Order | null> {
    const order = this.orders.find((o) => o.id === orderId && o.sessionId === sessionId);
    return order ? structuredClone(order) : null;
  }

  async listOrders(sessionId: string, limit?: number): Promise<Order[]> {
    const owned = this.orders
      .filter((o) => o.sessionId === sessionId)
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime() || b.id - a.id);
    return structuredClone(limit === undefined ? owned : owned.slice(0, limit));
  }

  async findOrderByVoucher(code: string): Promise<Order | null> {
    const order = this.orders.find((o) => o.voucherCode === code);
    return order ? structuredClone(order) : null;
  }

  async findUnusedVoucherForSession(sessionId: string): Promise<Voucher | null> {
    for (const voucher of this.vouchers.values()) {
      if (voucher.generatedBySession === sessionId && !voucher.isUsed) {
        return structuredClone(voucher);
      }
    }
    return null;
  }

  async createVoucher(voucher: NewVoucher): Promise<Voucher> {
    if (this.vouchers.has(voucher.code)) {
      throw AppError.uniqueViolation('vouchers_code_uniq');
    }
    const created: Voucher = {
      code: voucher.code,
      amountCents: voucher.amountCents,
      isUsed: false,
      generatedBySession: voucher.generatedBySession,
      usedBySession: null,
      createdAt: new Date(),
      usedAt: null,
      expiresAt: voucher.expiresAt ?? null,
    };
    this.vouchers.set(created.code, created);
    return structuredClone(created);
  }

  async transaction<T>(fn: (tx: CommerceTransaction) => Promise<T>): Promise<T> {
    const staged: StagedWrites = { orders: [], voucherUsage: [] };
    const result = await fn(this.createTransaction(staged));
    this.commit(staged);
    return result;
  }

  async close(): Promise<void> {
    // nothing to release
  }

  private createTransaction(staged: StagedWrites): CommerceTransaction {
    return {
      findVoucher: async (code) => {
        const voucher = this.vouchers.get(code);
        if (!voucher) {
          return null;
        }
        const usage = staged.voucherUsage.find((u) => u.code === code);
        const view = usage
          ? { ...voucher, isUsed: true, usedBySession: usage.sessionId, usedAt: usage.usedAt }
          : voucher;
        return structuredClone(view);
      },

      findOrderByVoucher: async (code) => {
        const order = staged.orders.find((o) => o.voucherCode === code)
          ?? this.orders.find((o) => o.voucherCode === code);
        return order ? structuredClone(order) : null;
      },

      insertOrder: async (newOrder: NewOrder) => {
        if (this.voucherCodeTaken(newOrder.voucherCode, staged.orders)) {
          throw AppError.uniqueViolation('orders_voucher_code_uniq');
        }
        const order: Order = {
          id: this.nextOrderId++,
          sessionId: newOrder.sessionId,
          voucherCode: newOrder.voucherCode,
          totalCents: newOrder.totalCents,
          status: newOrder.status,
          createdAt: new Date(),
          items: newOrder.items.map((item) => ({ ...item })),
        };
        staged.orders.push(order);
        return structuredClone(order);
      },

      markVoucherUsed: async (code, sessionId, usedAt) => {
        if (!this.vouchers.has(code)) {
          throw AppError.database(`Voucher ${code} does not exist`);
        }
        staged.voucherUsage.push({ code, sessionId, usedAt });
      },
    };
  }

  private voucherCodeTaken(code: string, staged: Order[]): boolean {
    return staged.some((o) => o.voucherCode === code) || this.orders.some((o) => o.voucherCode === code);
  }

  /**
   * Validate every staged write against committed state, then apply them all.
   */
  private commit(staged: StagedWrites): void {
    for (const order of staged.orders) {
      if (order.voucherCode !== null && this.orders.some((o) => o.voucherCode === order.voucherCode)) {
        throw AppError.uniqueViolation('orders_voucher_code_uniq');
      }
    }

    this.orders = [...this.orders, ...staged.orders];
    for (const usage of staged.voucherUsage) {
      const voucher = this.vouchers.get(usage.code);
      if (voucher) {
        voucher.isUsed = true;
        voucher.usedBySession = usage.sessionId;
        voucher.usedAt = usage.usedAt;
      }
    }
  }
}
