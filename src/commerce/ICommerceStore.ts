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

/**
 * Writes made inside one purchase attempt. Everything done through a
 * transaction commits together or not at all.
 */
export interface CommerceTransaction {
  findVoucher(code: string): Promise<Voucher | null>;
  findOrderByVoucher(code: string): Promise<Order | null>;
  /**
   * Insert an order with its items.
   * Rejects with a unique violation when another order already holds the voucher code.
   */
  insertOrder(order: NewOrder): Promise<Order>;
  markVoucherUsed(code: string, sessionId: string, usedAt: Date): Promise<void>;
}

export interface UpsertShippingResult {
  info: ShippingInfo;
  created: boolean;
}

/**
 * Persistent commerce state: catalog reads, shipping info, orders and vouchers.
 */
export interface ICommerceStore {
  getProduct(productId: number): Promise<Product | null>;
  /** Sorted, active products only */
  getCatalogFacets(): Promise<CatalogFacets>;

  getShippingInfo(sessionId: string): Promise<ShippingInfo | null>;
  upsertShippingInfo(sessionId: string, details: ShippingDetails): Promise<UpsertShippingResult>;
  /** Returns null when the session has no shipping info yet */
  updateShippingInfo(sessionId: string, patch: Partial<ShippingDetails>): Promise<ShippingInfo | null>;

  getOrder(sessionId: string, orderId: number): Promise<Order | null>;
  /** Newest first; all orders when limit is omitted */
  listOrders(sessionId: string, limit?: number): Promise<Order[]>;
  findOrderByVoucher(code: string): Promise<Order | null>;

  findUnusedVoucherForSession(sessionId: string): Promise<Voucher | null>;
  /** Rejects with a unique violation when the code already exists */
  createVoucher(voucher: NewVoucher): Promise<Voucher>;

  transaction<T>(fn: (tx: CommerceTransaction) => Promise<T>): Promise<T>;

  close(): Promise<void>;
}
