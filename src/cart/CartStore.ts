import { fromCents } from './money.js';

export interface CartItem {
  productId: number;
  /** Name snapshot taken when the item was added */
  productName: string;
  quantity: number;
  /** Unit price snapshot in cents */
  unitPriceCents: number;
  image?: string | null;
}

export type AddItemResult =
  | { ok: true; item: CartItem; totalCents: number }
  | { ok: false; reason: 'already_in_cart'; existing: CartItem }
  | { ok: false; reason: 'invalid_quantity' };

export type UpdateItemResult =
  | { ok: true; item: CartItem }
  | { ok: false; reason: 'not_in_cart' | 'invalid_quantity' };

export type RemoveItemResult =
  | { ok: true; item: CartItem }
  | { ok: false; reason: 'not_in_cart' };

export interface CartSummaryItem {
  product_id: number;
  product_name: string;
  quantity: number;
  unit_price: string;
  subtotal: string;
  image: string | null;
}

export interface CartSummary {
  items: CartSummaryItem[];
  item_count: number;
  total: string;
  total_formatted: string;
}

export function subtotalCents(item: CartItem): number {
  return item.quantity * item.unitPriceCents;
}

/**
 * Per-session shopping carts held in process memory.
 *
 * Each session owns one Map keyed by product id, so a product can appear
 * at most once per cart. Adding an existing product is rejected rather than
 * merged; callers update quantities explicitly.
 */
export class CartStore {
  private readonly carts = new Map<string, Map<number, CartItem>>();

  private cartFor(sessionId: string): Map<number, CartItem> {
    let cart = this.carts.get(sessionId);
    if (!cart) {
      cart = new Map();
      this.carts.set(sessionId, cart);
    }
    return cart;
  }

  getItems(sessionId: string): CartItem[] {
    const cart = this.carts.get(sessionId);
    return cart ? Array.from(cart.values(), (item) => ({ ...item })) : [];
  }

  getItem(sessionId: string, productId: number): CartItem | undefined {
    const item = this.carts.get(sessionId)?.get(productId);
    return item ? { ...item } : undefined;
  }

  isEmpty(sessionId: string): boolean {
    return (this.carts.get(sessionId)?.size ?? 0) === 0;
  }

  addItem(sessionId: string, item: CartItem): AddItemResult {
    if (!Number.isInteger(item.quantity) || item.quantity <= 0) {
      return { ok: false, reason: 'invalid_quantity' };
    }
    const cart = this.cartFor(sessionId);
    const existing = cart.get(item.productId);
    if (existing) {
      return { ok: false, reason: 'already_in_cart', existing: { ...existing } };
    }
    cart.set(item.productId, { ...item });
    return { ok: true, item: { ...item }, totalCents: this.getTotalCents(sessionId) };
  }

  updateQuantity(sessionId: string, productId: number, quantity: number): UpdateItemResult {
    if (!Number.isInteger(quantity) || quantity <= 0) {
      return { ok: false, reason: 'invalid_quantity' };
    }
    const item = this.carts.get(sessionId)?.get(productId);
    if (!item) {
      return { ok: false, reason: 'not_in_cart' };
    }
    item.quantity = quantity;
    return { ok: true, item: { ...item } };
  }

  removeItem(sessionId: string, productId: number): RemoveItemResult {
    const cart = this.carts.get(sessionId);
    const item = cart?.get(productId);
    if (!cart || !item) {
      return { ok: false, reason: 'not_in_cart' };
    }
    cart.delete(productId);
    return { ok: true, item };
  }

  clear(sessionId: string): void {
    this.carts.delete(sessionId);
  }

  getTotalCents(sessionId: string): number {
    let total = 0;
    for (const item of this.carts.get(sessionId)?.values() ?? []) {
      total += subtotalCents(item);
    }
    return total;
  }

  getSummary(sessionId: string): CartSummary {
    const items = this.getItems(sessionId);
    const total = this.getTotalCents(sessionId);
    return {
      items: items.map((item) => ({
        product_id: item.productId,
        product_name: item.productName,
        quantity: item.quantity,
        unit_price: fromCents(item.unitPriceCents),
        subtotal: fromCents(subtotalCents(item)),
        image: item.image ?? null,
      })),
      item_count: items.length,
      total: fromCents(total),
      total_formatted: `$${fromCents(total)}`,
    };
  }
}
