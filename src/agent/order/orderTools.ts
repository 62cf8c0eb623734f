import type { CartStore } from '../../cart/CartStore.js';
import { formatMoney } from '../../cart/money.js';
import type { ICommerceStore } from '../../commerce/ICommerceStore.js';
import type { PurchaseService } from '../../commerce/PurchaseService.js';
import type { CatalogFacets, ShippingDetails } from '../../commerce/types.js';
import type { AppError } from '../../errors/AppError.js';
import { withTimeout } from '../../http/timeout.js';
import { executeProductSearch } from '../../retrieval/productSearch.js';
import type { IVectorStore } from '../../retrieval/types.js';
import {
  assertNever,
  defineTool,
  parseToolArguments,
  type SearchParameters,
  type ToolContext,
  type ToolOutcome,
  type ToolRegistry,
} from '../tools.js';
import {
  formatCart,
  formatOrderDetail,
  formatPurchaseOutcome,
  formatRecentOrders,
  formatShippingDetails,
  PURCHASE_CART_EMPTY,
  PURCHASE_SHIPPING_MISSING,
  PURCHASE_VOUCHER_MISSING,
} from './orderFormat.js';
import {
  createOrderToolSchemas,
  shippingDetailsSchema,
  type OrderToolCall,
  type OrderToolName,
} from './orderSchemas.js';

export interface OrderToolTimeouts {
  dbMs: number;
  searchMs: number;
  purchaseMs: number;
  ordersMs: number;
}

export interface OrderToolDependencies {
  cartStore: CartStore;
  commerceStore: ICommerceStore;
  purchaseService: PurchaseService;
  vectorStore: IVectorStore;
  productCollection: string;
  /** Values the search tool's category and brand filters accept */
  catalogFacets: CatalogFacets;
  timeouts: OrderToolTimeouts;
}

const RECENT_ORDERS_LIMIT = 5;

const TOOL_DESCRIPTIONS: Record<OrderToolName, string> = {
  search_products:
    'Search the catalog with semantic search. Extract every filter the customer mentions (price range, category, brand, featured). ' +
    'Use only to find or browse products, not to add them to the cart.',
  add_to_cart: 'Add a product that is NOT yet in the cart. Use edit_item_in_cart for items already in the cart.',
  edit_item_in_cart: 'Set the quantity of an item already in the cart. Quantity must be greater than 0.',
  remove_from_cart: 'Remove an item from the cart entirely.',
  view_cart: 'Show the cart contents and total.',
  get_shipping_info: 'Check whether shipping information exists for this customer.',
  create_shipping_info: 'Save shipping information (fullName, address, city and zipCode are all required).',
  edit_shipping_info: 'Update some fields of existing shipping information.',
  get_orders: 'Get a specific order by ID, or the 5 most recent orders when no ID is given.',
  purchase: 'Complete the purchase of the cart with a voucher code. Requires a non-empty cart and shipping information.',
};

/** Action names used when a tool fails or times out */
const TOOL_ACTIONS: Record<OrderToolName, string> = {
  search_products: 'Product search',
  add_to_cart: 'Adding to cart',
  edit_item_in_cart: 'Updating cart',
  remove_from_cart: 'Removing from cart',
  view_cart: 'Viewing cart',
  get_shipping_info: 'Retrieving shipping information',
  create_shipping_info: 'Saving shipping information',
  edit_shipping_info: 'Updating shipping information',
  get_orders: 'Retrieving orders',
  purchase: 'Processing purchase',
};

const ORDER_TOOL_NAMES = Object.keys(TOOL_DESCRIPTIONS).filter(isOrderToolName);

function isOrderToolName(name: string): name is OrderToolName {
  return Object.hasOwn(TOOL_DESCRIPTIONS, name);
}

function text(output: string): ToolOutcome {
  return { output };
}

export function createOrderToolRegistry(deps: OrderToolDependencies): ToolRegistry<OrderToolCall> {
  const { cartStore, commerceStore, purchaseService, vectorStore, timeouts } = deps;
  const schemas = createOrderToolSchemas(deps.catalogFacets);

  const db = <T>(label: OrderToolName, fn: () => Promise<T>, ms: number = timeouts.dbMs): Promise<T> =>
    withTimeout(() => fn(), ms, label);

  async function addToCart(productId: number, quantity: number, context: ToolContext): Promise<ToolOutcome> {
    if (quantity <= 0) {
      return text('Error: Quantity must be at least 1.');
    }

    const product = await db('add_to_cart', () => commerceStore.getProduct(productId));
    if (!product) {
      return text(`Error: Product with ID ${productId} not found.`);
    }
    if (!product.isActive || product.priceCents === null) {
      return text(`Error: Product '${product.name}' is not available for purchase.`);
    }
    if (product.stockQuantity < quantity) {
      return text(`Error: Insufficient stock. Only ${product.stockQuantity} available for '${product.name}'.`);
    }

    const result = cartStore.addItem(context.sessionId, {
      productId: product.id,
      productName: product.name,
      quantity,
      unitPriceCents: product.priceCents,
      image: product.primaryImage,
    });

    if (!result.ok) {
      if (result.reason === 'already_in_cart') {
        return text(`${product.name} is already in your cart. Use edit_item_in_cart to update the quantity.`);
      }
      return text('Error: Quantity must be at least 1.');
    }
    return text(`Added ${quantity}x ${product.name} to cart. Cart total: ${formatMoney(result.totalCents)}`);
  }

  async function editCartItem(productId: number, quantity: number, context: ToolContext): Promise<ToolOutcome> {
    if (quantity <= 0) {
      return text('Quantity must be greater than 0. Use remove_from_cart to remove items.');
    }
    const current = cartStore.getItem(context.sessionId, productId);
    if (!current) {
      return text(`Product with ID ${productId} not found in cart.`);
    }

    if (quantity > current.quantity) {
      const product = await db('edit_item_in_cart', () => commerceStore.getProduct(productId));
      if (product && product.stockQuantity < quantity) {
        return text(`Error: Insufficient stock. Only ${product.stockQuantity} available for '${product.name}'.`);
      }
    }

    const result = cartStore.updateQuantity(context.sessionId, productId, quantity);
    if (!result.ok) {
      return text(`Product with ID ${productId} not found in cart.`);
    }
    return text(`Updated ${result.item.productName} quantity to ${quantity}`);
  }

  function removeCartItem(productId: number, context: ToolContext): ToolOutcome {
    const result = cartStore.removeItem(context.sessionId, productId);
    if (!result.ok) {
      return text(`Product with ID ${productId} not found in cart.`);
    }
    return text(`Removed ${result.item.productName} from cart`);
  }

  async function getShippingInfo(context: ToolContext): Promise<ToolOutcome> {
    const info = await db('get_shipping_info', () => commerceStore.getShippingInfo(context.sessionId));
    if (!info) {
      return text(
        'No shipping information found. ' +
        'Please provide your shipping details (full name, address, city, zip code) before completing your purchase.'
      );
    }
    return text(
      `Shipping information found:\n${formatShippingDetails(info)}\n\nYou can proceed with purchase using a voucher code.`
    );
  }

  async function createShippingInfo(data: Partial<ShippingDetails>, context: ToolContext): Promise<ToolOutcome> {
    const parsed = shippingDetailsSchema.safeParse(data);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
      return text(
        `Error: Invalid shipping information. ${issues}. ` +
        'Please provide all required fields: fullName, address, city, and zipCode.'
      );
    }

    const { info, created } = await db('create_shipping_info', () =>
      commerceStore.upsertShippingInfo(context.sessionId, parsed.data)
    );
    const heading = created ? 'Shipping information saved successfully!' : 'Shipping information updated successfully!';
    return text(`${heading}\n${formatShippingDetails(info)}\n\nYou can now proceed with purchase using a voucher code.`);
  }

  async function editShippingInfo(data: Partial<ShippingDetails>, context: ToolContext): Promise<ToolOutcome> {
    const existing = await db('edit_shipping_info', () => commerceStore.getShippingInfo(context.sessionId));
    if (!existing) {
      return text(
        'Error: No shipping information found to update. ' +
        'Please create shipping information first using create_shipping_info.'
      );
    }

    const parsed = shippingDetailsSchema.partial().safeParse(data);
    if (!parsed.success) {
      const [issue] = parsed.error.issues;
      return text(`Error: ${issue?.message ?? 'Invalid shipping information'}.`);
    }

    const patch: Partial<ShippingDetails> = {};
    const updatedFields: string[] = [];
    for (const field of ['fullName', 'address', 'city', 'zipCode'] as const) {
      const value = parsed.data[field];
      if (value !== undefined) {
        patch[field] = value;
        updatedFields.push(field);
      }
    }
    if (updatedFields.length === 0) {
      return text(
        'Error: No valid fields provided to update. ' +
        'Please specify at least one field: fullName, address, city, or zipCode.'
      );
    }

    const updated = await db('edit_shipping_info', () => commerceStore.updateShippingInfo(context.sessionId, patch));
    if (!updated) {
      return text('Error: No shipping information found to update. Please create shipping information first using create_shipping_info.');
    }
    return text(
      `Shipping information updated successfully! Updated fields: ${updatedFields.join(', ')}\n` +
      `${formatShippingDetails(updated)}\n\nYou can now proceed with purchase using a voucher code.`
    );
  }

  async function getOrders(orderId: number | undefined, context: ToolContext): Promise<ToolOutcome> {
    if (orderId !== undefined) {
      const order = await db('get_orders', () => commerceStore.getOrder(context.sessionId, orderId), timeouts.ordersMs);
      if (!order) {
        return text(`Error: Order ID ${orderId} not found or does not belong to your session.`);
      }
      return text(formatOrderDetail(order));
    }
    const orders = await db(
      'get_orders',
      () => commerceStore.listOrders(context.sessionId, RECENT_ORDERS_LIMIT),
      timeouts.ordersMs
    );
    return text(formatRecentOrders(orders));
  }

  /**
   * Preconditions are checked before the purchase runs; each missing one
   * gets its own message.
   */
  async function purchase(voucherCode: string | undefined, context: ToolContext): Promise<ToolOutcome> {
    if (cartStore.isEmpty(context.sessionId)) {
      return text(PURCHASE_CART_EMPTY);
    }
    const shipping = await db('purchase', () => commerceStore.getShippingInfo(context.sessionId));
    if (!shipping) {
      return text(PURCHASE_SHIPPING_MISSING);
    }
    const code = voucherCode?.trim();
    if (!code) {
      return text(PURCHASE_VOUCHER_MISSING);
    }

    const outcome = await db('purchase', () => purchaseService.purchase(context.sessionId, code), timeouts.purchaseMs);
    return text(formatPurchaseOutcome(outcome));
  }

  return {
    definitions: ORDER_TOOL_NAMES.map((name) =>
      defineTool(name, TOOL_DESCRIPTIONS[name], schemas[name])
    ),

    parse(name: string, rawArgs: string): OrderToolCall | null {
      if (!isOrderToolName(name)) {
        return null;
      }
      switch (name) {
        case 'search_products':
          return { name, args: parseToolArguments(name, rawArgs, schemas.search_products) };
        case 'add_to_cart':
          return { name, args: parseToolArguments(name, rawArgs, schemas.add_to_cart) };
        case 'edit_item_in_cart':
          return { name, args: parseToolArguments(name, rawArgs, schemas.edit_item_in_cart) };
        case 'remove_from_cart':
          return { name, args: parseToolArguments(name, rawArgs, schemas.remove_from_cart) };
        case 'view_cart':
          return { name, args: parseToolArguments(name, rawArgs, schemas.view_cart) };
        case 'get_shipping_info':
          return { name, args: parseToolArguments(name, rawArgs, schemas.get_shipping_info) };
        case 'create_shipping_info':
          return { name, args: parseToolArguments(name, rawArgs, schemas.create_shipping_info) };
        case 'edit_shipping_info':
          return { name, args: parseToolArguments(name, rawArgs, schemas.edit_shipping_info) };
        case 'get_orders':
          return { name, args: parseToolArguments(name, rawArgs, schemas.get_orders) };
        case 'purchase':
          return { name, args: parseToolArguments(name, rawArgs, schemas.purchase) };
        default:
          return assertNever(name);
      }
    },

    async execute(call: OrderToolCall, context: ToolContext): Promise<ToolOutcome> {
      switch (call.name) {
        case 'search_products': {
          const result = await db(
            'search_products',
            () => executeProductSearch(vectorStore, deps.productCollection, call.args, context.minSimilarity),
            timeouts.searchMs
          );
          return { output: result.text, sources: result.sources };
        }
        case 'add_to_cart':
          return addToCart(call.args.product_id, call.args.quantity, context);
        case 'edit_item_in_cart':
          return editCartItem(call.args.product_id, call.args.quantity, context);
        case 'remove_from_cart':
          return removeCartItem(call.args.product_id, context);
        case 'view_cart':
          return text(formatCart(cartStore.getItems(context.sessionId), cartStore.getTotalCents(context.sessionId)));
        case 'get_shipping_info':
          return getShippingInfo(context);
        case 'create_shipping_info':
          return createShippingInfo(call.args.shipping_data, context);
        case 'edit_shipping_info':
          return editShippingInfo(call.args.shipping_data, context);
        case 'get_orders':
          return getOrders(call.args.order_id, context);
        case 'purchase':
          return purchase(call.args.voucher_code, context);
        default:
          return assertNever(call);
      }
    },

    describeFailure(call: OrderToolCall, error: AppError): string {
      const action = TOOL_ACTIONS[call.name];
      if (error.isTimeout) {
        return `Error: ${action} timed out. Please try again.`;
      }
      return `Error: ${action} failed. ${error.safeMessage}`;
    },

    captureSearchParameters(call: OrderToolCall, context: ToolContext): SearchParameters | undefined {
      if (call.name !== 'search_products') {
        return undefined;
      }
      const { args } = call;
      const params: SearchParameters = { query: args.query || context.query };
      if (args.category !== undefined) params.category = args.category;
      if (args.brand !== undefined) params.brand = args.brand;
      if (args.min_price !== undefined) params.min_price = args.min_price;
      if (args.max_price !== undefined) params.max_price = args.max_price;
      if (args.is_featured !== undefined) params.is_featured = args.is_featured;
      return params;
    },
  };
}
