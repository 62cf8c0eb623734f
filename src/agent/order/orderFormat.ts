import { subtotalCents, type CartItem } from '../../cart/CartStore.js';
import { formatMoney } from '../../cart/money.js';
import type { PurchaseOutcome } from '../../commerce/PurchaseService.js';
import type { Order, ShippingDetails } from '../../commerce/types.js';

export const EMPTY_CART_MESSAGE = 'Your cart is empty. Add items to your cart to get started!';
export const NO_ORDERS_MESSAGE = 'You have no orders yet. Start shopping to create your first order!';

export const PURCHASE_CART_EMPTY =
  'Error: Your cart is empty. Please add items to your cart before purchasing.';
export const PURCHASE_SHIPPING_MISSING =
  'Error: Please provide shipping information before purchasing. Use create_shipping_info or provide your shipping details.';
export const PURCHASE_VOUCHER_MISSING =
  'Error: Please provide a voucher code to complete your purchase.';

/** "2026-03-14 09:26:53" (UTC) */
export function formatTimestamp(date: Date): string {
  return date.toISOString().replace('T', ' ').substring(0, 19);
}

export function formatCart(items: CartItem[], totalCents: number): string {
  if (items.length === 0) {
    return EMPTY_CART_MESSAGE;
  }

  const lines = ['Your Shopping Cart:', ''];
  for (const item of items) {
    lines.push(
      `• ${item.productName} (ID: ${item.productId})\n` +
      `  Quantity: ${item.quantity} × ${formatMoney(item.unitPriceCents)} = ${formatMoney(subtotalCents(item))}`
    );
  }
  lines.push('', `Total: ${formatMoney(totalCents)}`, `Items in cart: ${items.length}`);
  return lines.join('\n');
}

export function formatShippingDetails(details: ShippingDetails): string {
  return [
    `Full Name: ${details.fullName}`,
    `Address: ${details.address}`,
    `City: ${details.city}`,
    `Zip Code: ${details.zipCode}`,
  ].join('\n');
}

export function formatOrderDetail(order: Order): string {
  const lines = [
    `Order #${order.id}`,
    `Status: ${order.status}`,
    `Total: ${formatMoney(order.totalCents)}`,
    `Voucher Code: ${order.voucherCode ?? 'None'}`,
    `Created: ${formatTimestamp(order.createdAt)}`,
    '',
    'Items:',
  ];
  for (const item of order.items) {
    lines.push(
      `  • ${item.productName} (Product ID: ${item.productId})\n` +
      `    Quantity: ${item.quantity} × ${formatMoney(item.unitPriceCents)} = ${formatMoney(item.subtotalCents)}`
    );
  }
  return lines.join('\n');
}

export function formatRecentOrders(orders: Order[]): string {
  if (orders.length === 0) {
    return NO_ORDERS_MESSAGE;
  }

  const lines = [`Your ${orders.length} Most Recent Orders:`, ''];
  for (const order of orders) {
    lines.push(
      `Order #${order.id} - ${order.status.toUpperCase()}\n` +
      `Total: ${formatMoney(order.totalCents)}\n` +
      `Voucher: ${order.voucherCode ?? 'None'}\n` +
      `Date: ${formatTimestamp(order.createdAt)}\n` +
      `Items (${order.items.length}):`
    );
    for (const item of order.items) {
      lines.push(`  • ${item.productName} (Qty: ${item.quantity}) - ${formatMoney(item.subtotalCents)}`);
    }
    lines.push('');
  }
  return lines.join('\n');
}

export function formatPurchaseOutcome(outcome: PurchaseOutcome): string {
  switch (outcome.kind) {
    case 'completed': {
      const { order, shipping } = outcome;
      const items = order.items
        .map((item) => `  • ${item.productName} (Qty: ${item.quantity}) - ${formatMoney(item.subtotalCents)}`)
        .join('\n');
      return (
        '✅ Purchase completed successfully! Your order has been placed and saved.\n\n' +
        'Order Details:\n' +
        `  Order ID: ${order.id}\n` +
        `  Status: ${order.status}\n` +
        `  Total Amount: ${formatMoney(order.totalCents)}\n` +
        `  Voucher Code Used: ${order.voucherCode ?? ''}\n` +
        `  Remaining Voucher Balance: ${formatMoney(outcome.remainingCents)}\n` +
        `\nOrder Items:\n${items}\n` +
        '\nShipping Address:\n' +
        `  ${shipping.fullName}\n` +
        `  ${shipping.address}\n` +
        `  ${shipping.city}, ${shipping.zipCode}\n` +
        `\nOrder Date: ${formatTimestamp(order.createdAt)}\n` +
        '\nThank you for your purchase! Your order is confirmed and will be processed shortly.'
      );
    }
    case 'already_placed':
      return `✅ Your purchase has already been placed. Order ID: ${outcome.orderId}`;
    case 'cart_empty':
      return PURCHASE_CART_EMPTY;
    case 'shipping_missing':
      return PURCHASE_SHIPPING_MISSING;
    case 'invalid_voucher':
      return `Error: Invalid voucher code '${outcome.code}'. Please check and try again.`;
    case 'voucher_inconsistent':
      return (
        `Error: Voucher '${outcome.code}' is marked as used, but no order was found for it. ` +
        'Please contact support.'
      );
    case 'insufficient_balance':
      return (
        'Error: Insufficient voucher balance. ' +
        `Your cart total is ${formatMoney(outcome.totalCents)}, but your voucher is worth ${formatMoney(outcome.amountCents)} ` +
        `(short by ${formatMoney(outcome.totalCents - outcome.amountCents)}). ` +
        'Please remove some items or use a voucher with sufficient balance.'
      );
  }
}
