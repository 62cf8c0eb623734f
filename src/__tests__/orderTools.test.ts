import { describe, it, expect, beforeEach, vi } from 'vitest';
import { CartStore } from '../cart/CartStore.js';
import { InMemoryCommerceStore } from '../commerce/InMemoryCommerceStore.js';
import { PurchaseService } from '../commerce/PurchaseService.js';
import { AppError } from '../errors/AppError.js';
import { MalformedToolArgsError } from '../errors/protocolErrors.js';
import {
  EMPTY_CART_MESSAGE,
  PURCHASE_CART_EMPTY,
  PURCHASE_SHIPPING_MISSING,
  PURCHASE_VOUCHER_MISSING,
} from '../agent/order/orderFormat.js';
import type { OrderToolCall } from '../agent/order/orderSchemas.js';
import { createOrderToolRegistry } from '../agent/order/orderTools.js';
import type { ToolContext, ToolRegistry } from '../agent/tools.js';
import type { IVectorStore } from '../retrieval/types.js';
import { makeProduct, makeShipping, makeVoucher, scored } from './helpers/fixtures.js';

const SESSION = 'session_a';
const context: ToolContext = { sessionId: SESSION, query: 'test query', minSimilarity: 0.7 };

const timeouts = { dbMs: 1000, searchMs: 1000, purchaseMs: 1000, ordersMs: 1000 };

const catalogFacets = { categories: ['Accessories', 'Clothing', 'Electronics'], brands: ['Acme'] };

describe('order tool registry', () => {
  let store: InMemoryCommerceStore;
  let cart: CartStore;
  let vectorStore: IVectorStore;
  let registry: ToolRegistry<OrderToolCall>;

  function build(): void {
    registry = createOrderToolRegistry({
      cartStore: cart,
      commerceStore: store,
      purchaseService: new PurchaseService(store, cart),
      vectorStore,
      productCollection: 'products',
      catalogFacets,
      timeouts,
    });
  }

  async function run(name: string, args: unknown): Promise<string> {
    const call = registry.parse(name, JSON.stringify(args));
    if (!call) {
      throw new Error(`unknown tool ${name}`);
    }
    const outcome = await registry.execute(call, context);
    return outcome.output;
  }

  beforeEach(() => {
    store = new InMemoryCommerceStore({
      products: [
        makeProduct({ id: 1, name: 'Trail Runner Shoe', priceCents: 2299, stockQuantity: 10 }),
        makeProduct({ id: 2, name: 'Rare Watch', priceCents: 50000, stockQuantity: 1 }),
        makeProduct({ id: 3, name: 'Retired Hat', isActive: false }),
      ],
      vouchers: [makeVoucher({ code: 'VOUCHER-TEST0001', amountCents: 200000 })],
    });
    cart = new CartStore();
    vectorStore = { similaritySearchWithScore: vi.fn().mockResolvedValue([]) };
    build();
  });

  describe('parse', () => {
    it('coerces ids and fills the default quantity', () => {
      expect(registry.parse('add_to_cart', '{"product_id": "1"}')).toEqual({
        name: 'add_to_cart',
        args: { product_id: 1, quantity: 1 },
      });
    });

    it('returns null for a tool the registry does not have', () => {
      expect(registry.parse('delete_everything', '{}')).toBeNull();
    });

    it('throws on malformed JSON', () => {
      expect(() => registry.parse('add_to_cart', '{product_id: 1')).toThrow(MalformedToolArgsError);
    });

    it('throws when a category is outside the catalog facets', () => {
      expect(() => registry.parse('search_products', '{"query": "x", "category": "Spaceships"}'))
        .toThrow(MalformedToolArgsError);
    });

    it('takes its filter values from the catalog facets it was built with', () => {
      registry = createOrderToolRegistry({
        cartStore: cart,
        commerceStore: store,
        purchaseService: new PurchaseService(store, cart),
        vectorStore,
        productCollection: 'products',
        catalogFacets: { categories: ['Outdoor'], brands: ['Northwind'] },
        timeouts,
      });

      expect(registry.parse('search_products', '{"query": "tent", "brand": "Northwind"}')).toEqual({
        name: 'search_products',
        args: { query: 'tent', k: 5, brand: 'Northwind' },
      });
      expect(() => registry.parse('search_products', '{"query": "tent", "brand": "Acme"}'))
        .toThrow(MalformedToolArgsError);
    });

    it('accepts any brand when the catalog has no facets', () => {
      registry = createOrderToolRegistry({
        cartStore: cart,
        commerceStore: store,
        purchaseService: new PurchaseService(store, cart),
        vectorStore,
        productCollection: 'products',
        catalogFacets: { categories: [], brands: [] },
        timeouts,
      });

      expect(registry.parse('search_products', '{"query": "tent", "brand": "Northwind"}')).toEqual({
        name: 'search_products',
        args: { query: 'tent', k: 5, brand: 'Northwind' },
      });
    });
  });

  describe('cart tools', () => {
    it('adds a product and reports the cart total', async () => {
      expect(await run('add_to_cart', { product_id: 1, quantity: 2 }))
        .toBe('Added 2x Trail Runner Shoe to cart. Cart total: $45.98');
    });

    it('refuses to add a product that is already in the cart', async () => {
      await run('add_to_cart', { product_id: 1 });

      expect(await run('add_to_cart', { product_id: 1, quantity: 3 }))
        .toBe('Trail Runner Shoe is already in your cart. Use edit_item_in_cart to update the quantity.');
      expect(cart.getItem(SESSION, 1)?.quantity).toBe(1);
    });

    it('rejects unknown, inactive and out-of-stock products', async () => {
      expect(await run('add_to_cart', { product_id: 99 })).toBe('Error: Product with ID 99 not found.');
      expect(await run('add_to_cart', { product_id: 3 }))
        .toBe("Error: Product 'Retired Hat' is not available for purchase.");
      expect(await run('add_to_cart', { product_id: 2, quantity: 2 }))
        .toBe("Error: Insufficient stock. Only 1 available for 'Rare Watch'.");
    });

    it('rejects a zero quantity', async () => {
      expect(await run('add_to_cart', { product_id: 1, quantity: 0 })).toBe('Error: Quantity must be at least 1.');
    });

    it('edits and removes cart items', async () => {
      await run('add_to_cart', { product_id: 1 });

      expect(await run('edit_item_in_cart', { product_id: 1, quantity: 4 }))
        .toBe('Updated Trail Runner Shoe quantity to 4');
      expect(await run('edit_item_in_cart', { product_id: 1, quantity: 0 }))
        .toBe('Quantity must be greater than 0. Use remove_from_cart to remove items.');
      expect(await run('edit_item_in_cart', { product_id: 2, quantity: 1 }))
        .toBe('Product with ID 2 not found in cart.');
      expect(await run('remove_from_cart', { product_id: 1 })).toBe('Removed Trail Runner Shoe from cart');
      expect(await run('view_cart', {})).toBe(EMPTY_CART_MESSAGE);
    });

    it('renders the cart', async () => {
      await run('add_to_cart', { product_id: 1, quantity: 2 });

      expect(await run('view_cart', {})).toBe(
        'Your Shopping Cart:\n\n' +
        '• Trail Runner Shoe (ID: 1)\n' +
        '  Quantity: 2 × $22.99 = $45.98\n\n' +
        'Total: $45.98\n' +
        'Items in cart: 1'
      );
    });
  });

  describe('shipping tools', () => {
    it('reports missing shipping info', async () => {
      expect(await run('get_shipping_info', {})).toBe(
        'No shipping information found. ' +
        'Please provide your shipping details (full name, address, city, zip code) before completing your purchase.'
      );
    });

    it('saves shipping info and reads it back', async () => {
      const saved = await run('create_shipping_info', {
        shipping_data: { fullName: ' Jane Doe ', address: '1 Main St', city: 'Springfield', zipCode: '12345' },
      });

      expect(saved).toBe(
        'Shipping information saved successfully!\n' +
        'Full Name: Jane Doe\nAddress: 1 Main St\nCity: Springfield\nZip Code: 12345\n\n' +
        'You can now proceed with purchase using a voucher code.'
      );
      expect(await store.getShippingInfo(SESSION)).toMatchObject({ fullName: 'Jane Doe' });
    });

    it('names the invalid field', async () => {
      const output = await run('create_shipping_info', {
        shipping_data: { fullName: 'Jane Doe', address: '   ', city: 'Springfield', zipCode: '12345' },
      });

      expect(output).toBe(
        'Error: Invalid shipping information. address: Address cannot be empty. ' +
        'Please provide all required fields: fullName, address, city, and zipCode.'
      );
    });

    it('requires existing shipping info before an edit', async () => {
      expect(await run('edit_shipping_info', { shipping_data: { city: 'Shelbyville' } })).toBe(
        'Error: No shipping information found to update. ' +
        'Please create shipping information first using create_shipping_info.'
      );
    });

    it('updates only the given fields', async () => {
      await store.upsertShippingInfo(SESSION, makeShipping(SESSION));

      const output = await run('edit_shipping_info', { shipping_data: { city: 'Shelbyville' } });

      expect(output.split('\n')[0]).toBe('Shipping information updated successfully! Updated fields: city');
      expect(await store.getShippingInfo(SESSION)).toMatchObject({ city: 'Shelbyville', fullName: 'Jane Doe' });
    });

    it('rejects an edit with no fields', async () => {
      await store.upsertShippingInfo(SESSION, makeShipping(SESSION));

      expect(await run('edit_shipping_info', { shipping_data: {} })).toBe(
        'Error: No valid fields provided to update. ' +
        'Please specify at least one field: fullName, address, city, or zipCode.'
      );
    });
  });

  describe('purchase', () => {
    it('checks cart, shipping and voucher code in that order', async () => {
      expect(await run('purchase', { voucher_code: 'VOUCHER-TEST0001' })).toBe(PURCHASE_CART_EMPTY);

      await run('add_to_cart', { product_id: 1 });
      expect(await run('purchase', { voucher_code: 'VOUCHER-TEST0001' })).toBe(PURCHASE_SHIPPING_MISSING);

      await store.upsertShippingInfo(SESSION, makeShipping(SESSION));
      expect(await run('purchase', {})).toBe(PURCHASE_VOUCHER_MISSING);
      expect(await run('purchase', { voucher_code: '  ' })).toBe(PURCHASE_VOUCHER_MISSING);
      expect(await store.listOrders(SESSION)).toEqual([]);
    });

    it('completes a purchase and lists the order', async () => {
      await run('add_to_cart', { product_id: 1, quantity: 2 });
      await store.upsertShippingInfo(SESSION, makeShipping(SESSION));

      const output = await run('purchase', { voucher_code: 'VOUCHER-TEST0001' });

      expect(output).toContain('  Order ID: 1\n');
      expect(output).toContain('  Remaining Voucher Balance: $1954.02\n');
      expect(cart.isEmpty(SESSION)).toBe(true);

      const orders = await run('get_orders', {});
      expect(orders.split('\n')[0]).toBe('Your 1 Most Recent Orders:');
    });

    it('reports an unknown voucher', async () => {
      await run('add_to_cart', { product_id: 1 });
      await store.upsertShippingInfo(SESSION, makeShipping(SESSION));

      expect(await run('purchase', { voucher_code: 'VOUCHER-NOPE' }))
        .toBe("Error: Invalid voucher code 'VOUCHER-NOPE'. Please check and try again.");
    });

    describe('with preset vouchers', () => {
      beforeEach(() => {
        store = new InMemoryCommerceStore({
          products: [makeProduct({ id: 1, name: 'Trail Runner Shoe', priceCents: 2299, stockQuantity: 10 })],
          vouchers: [
            makeVoucher({ code: 'VOUCHER-LOW', amountCents: 3000 }),
            makeVoucher({ code: 'VOUCHER-STALE', isUsed: true }),
          ],
          shipping: [makeShipping(SESSION)],
        });
        build();
      });

      it('names the shortfall when the voucher does not cover the cart', async () => {
        await run('add_to_cart', { product_id: 1, quantity: 2 });

        expect(await run('purchase', { voucher_code: 'VOUCHER-LOW' })).toBe(
          'Error: Insufficient voucher balance. ' +
          'Your cart total is $45.98, but your voucher is worth $30.00 (short by $15.98). ' +
          'Please remove some items or use a voucher with sufficient balance.'
        );
        expect(cart.isEmpty(SESSION)).toBe(false);
      });

      it('reports a used voucher without an order as an inconsistency', async () => {
        await run('add_to_cart', { product_id: 1 });

        expect(await run('purchase', { voucher_code: 'VOUCHER-STALE' })).toBe(
          "Error: Voucher 'VOUCHER-STALE' is marked as used, but no order was found for it. " +
          'Please contact support.'
        );
        expect(await store.listOrders(SESSION)).toEqual([]);
      });
    });
  });

  describe('orders', () => {
    it('reports an order the session does not own', async () => {
      expect(await run('get_orders', { order_id: 7 }))
        .toBe('Error: Order ID 7 not found or does not belong to your session.');
    });
  });

  describe('search_products', () => {
    it('returns serialized products with their sources', async () => {
      vectorStore = {
        similaritySearchWithScore: vi.fn().mockResolvedValue([
          scored('Trail shoe', { product_id: 1, brand: 'Acme', category: 'Clothing', price: 22.99 }, 0.1),
        ]),
      };
      build();

      const call = registry.parse('search_products', '{"query": "shoes"}');
      if (!call) throw new Error('search_products not registered');
      const outcome = await registry.execute(call, context);

      expect(outcome.output).toBe(
        'Product ID: 1\nBrand: Acme\nCategory: Clothing\nPrice: $22.99\nContent: Trail shoe'
      );
      expect(outcome.sources).toHaveLength(1);
    });

    it('captures the resolved search arguments', () => {
      const call = registry.parse('search_products', '{"query": "shoes", "max_price": "50", "category": "Clothing"}');
      if (!call) throw new Error('search_products not registered');

      expect(registry.captureSearchParameters?.(call, context)).toEqual({
        query: 'shoes',
        category: 'Clothing',
        max_price: 50,
      });
    });

    it('captures nothing for other tools', () => {
      const call = registry.parse('view_cart', '{}');
      if (!call) throw new Error('view_cart not registered');

      expect(registry.captureSearchParameters?.(call, context)).toBeUndefined();
    });
  });

  describe('failures', () => {
    it('turns a slow store call into a timeout error', async () => {
      store.getProduct = () => new Promise<null>(() => {});
      registry = createOrderToolRegistry({
        cartStore: cart,
        commerceStore: store,
        purchaseService: new PurchaseService(store, cart),
        vectorStore,
        productCollection: 'products',
        catalogFacets,
        timeouts: { ...timeouts, dbMs: 10 },
      });

      const call = registry.parse('add_to_cart', '{"product_id": 1}');
      if (!call) throw new Error('add_to_cart not registered');

      await expect(registry.execute(call, context)).rejects.toMatchObject({ code: 'TIMEOUT_REQUEST' });
    });

    it('describes failures per tool', () => {
      const call = registry.parse('add_to_cart', '{"product_id": 1}');
      if (!call) throw new Error('add_to_cart not registered');

      expect(registry.describeFailure(call, AppError.timeout('add_to_cart', 10)))
        .toBe('Error: Adding to cart timed out. Please try again.');
      expect(registry.describeFailure(call, AppError.database('boom')))
        .toBe('Error: Adding to cart failed. The store is temporarily unavailable. Please try again later.');
    });
  });
});
