import pino from 'pino';
import { CartStore, subtotalCents } from '../cart/CartStore.js';
import { config } from '../config.js';
import { AppError } from '../errors/AppError.js';
import type { ICommerceStore } from './ICommerceStore.js';
import type { Order, ShippingInfo, Voucher } from './types.js';

const logger = pino({ name: 'PurchaseService' });

export type PurchaseOutcome =
  | { kind: 'completed'; order: Order; voucher: Voucher; remainingCents: number; shipping: ShippingInfo }
  | { kind: 'already_placed'; orderId: number }
  | { kind: 'cart_empty' }
  | { kind: 'shipping_missing' }
  | { kind: 'invalid_voucher'; code: string }
  | { kind: 'voucher_inconsistent'; code: string }
  | { kind: 'insufficient_balance'; totalCents: number; amountCents: number };

type CommitResult =
  | { kind: 'committed'; order: Order; voucher: Voucher }
  | Exclude<PurchaseOutcome, { kind: 'completed' } | { kind: 'cart_empty' } | { kind: 'shipping_missing' }>;

function isUniqueViolation(error: unknown): boolean {
  return error instanceof AppError && error.code === 'DATABASE_UNIQUE_VIOLATION';
}

/**
 * Converts a session's cart and a voucher into one durable order.
 *
 * Ordering: idempotency check, precondition checks, balance check, one
 * atomic write (order + items + voucher usage), then the cart is cleared.
 * The voucher code is unique on orders, so racing purchases with the same
 * code converge on a single order.
 */
export class PurchaseService {
  constructor(
    private readonly store: ICommerceStore,
    private readonly cartStore: CartStore
  ) {}

  async purchase(sessionId: string, voucherCode: string): Promise<PurchaseOutcome> {
    // A repeated call after a successful purchase finds the order before
    // tripping over the cart that purchase already cleared.
    const placed = await this.store.findOrderByVoucher(voucherCode);
    if (placed) {
      return { kind: 'already_placed', orderId: placed.id };
    }

    const cart = this.cartStore.getItems(sessionId);
    if (cart.length === 0) {
      return { kind: 'cart_empty' };
    }

    const shipping = await this.store.getShippingInfo(sessionId);
    if (!shipping) {
      return { kind: 'shipping_missing' };
    }

    const totalCents = this.cartStore.getTotalCents(sessionId);

    let result: CommitResult;
    try {
      result = await this.store.transaction(async (tx): Promise<CommitResult> => {
        const voucher = await tx.findVoucher(voucherCode);
        if (!voucher) {
          return { kind: 'invalid_voucher', code: voucherCode };
        }

        const existing = await tx.findOrderByVoucher(voucherCode);
        if (existing) {
          return { kind: 'already_placed', orderId: existing.id };
        }

        if (voucher.isUsed) {
          // Used flag without an order referencing the code
          logger.warn({ sessionId, voucherCode }, 'Voucher marked used but no order references it');
          return { kind: 'voucher_inconsistent', code: voucherCode };
        }

        if (voucher.amountCents < totalCents) {
          return { kind: 'insufficient_balance', totalCents, amountCents: voucher.amountCents };
        }

        const order = await tx.insertOrder({
          sessionId,
          voucherCode,
          totalCents,
          status: 'completed',
          items: cart.map((item) => ({
            productId: item.productId,
            productName: item.productName,
            quantity: item.quantity,
            unitPriceCents: item.unitPriceCents,
            subtotalCents: subtotalCents(item),
          })),
        });
        await tx.markVoucherUsed(voucherCode, sessionId, new Date());

        return { kind: 'committed', order, voucher };
      });
    } catch (error) {
      if (!isUniqueViolation(error)) {
        throw error;
      }
      // Lost a race against another purchase with the same voucher
      const winner = await this.store.findOrderByVoucher(voucherCode);
      if (!winner) {
        throw error;
      }
      logger.info({ sessionId, voucherCode, orderId: winner.id }, 'Concurrent purchase resolved to existing order');
      return { kind: 'already_placed', orderId: winner.id };
    }

    if (result.kind !== 'committed') {
      return result;
    }

    this.cartStore.clear(sessionId);

    if (config.debug) {
      logger.debug({ sessionId, orderId: result.order.id, totalCents }, 'Purchase committed');
    }

    return {
      kind: 'completed',
      order: result.order,
      voucher: result.voucher,
      remainingCents: result.voucher.amountCents - totalCents,
      shipping,
    };
  }
}
