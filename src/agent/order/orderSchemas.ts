import { z } from 'zod';
import type { CatalogFacets } from '../../commerce/types.js';

/**
 * LLM argument schemas for the order agent's tools.
 * Business rules (quantities, shipping field limits, purchase gates) are
 * checked by the handlers so violations come back as actionable messages.
 */

/**
 * Equality filter limited to the values the catalog holds, so a proposed
 * filter can match. Free text when the catalog has no values yet.
 */
function facetFilter(values: readonly string[], description: string) {
  const [first, ...rest] = values;
  if (first === undefined) {
    return z.string().optional().describe(description);
  }
  return z.enum([first, ...rest]).optional().describe(description);
}

export function createSearchProductsSchema(facets: CatalogFacets) {
  return z.object({
    query: z.string().min(1).describe('What the customer is looking for, including descriptive terms'),
    k: z.coerce.number().int().min(1).max(20).default(5).describe('Number of results to return'),
    category: facetFilter(facets.categories, 'Category filter'),
    brand: facetFilter(facets.brands, 'Brand filter'),
    min_price: z.coerce.number().min(0).optional().describe('Minimum price, e.g. "over $100" -> 100'),
    max_price: z.coerce.number().min(0).optional().describe('Maximum price, e.g. "under $50" -> 50'),
    is_featured: z.boolean().optional().describe('true for featured, popular or best-selling products'),
  });
}

export const addToCartSchema = z.object({
  product_id: z.coerce.number().int().describe('Product ID from search results'),
  quantity: z.coerce.number().int().default(1).describe('Quantity to add (defaults to 1)'),
});

export const editItemInCartSchema = z.object({
  product_id: z.coerce.number().int().describe('Product ID of the cart item'),
  quantity: z.coerce.number().int().describe('New total quantity for the item'),
});

export const removeFromCartSchema = z.object({
  product_id: z.coerce.number().int().describe('Product ID of the cart item to remove'),
});

export const emptyArgsSchema = z.object({});

const shippingFields = {
  fullName: z.string().optional().describe('Full name of the recipient'),
  address: z.string().optional().describe('Street address'),
  city: z.string().optional().describe('City'),
  zipCode: z.string().optional().describe('Zip or postal code'),
};

export const createShippingInfoSchema = z.object({
  shipping_data: z.object(shippingFields).describe('Complete shipping details'),
});

export const editShippingInfoSchema = z.object({
  shipping_data: z.object(shippingFields).describe('Only the fields the customer wants to change'),
});

export const getOrdersSchema = z.object({
  order_id: z.coerce.number().int().positive().optional().describe('Specific order ID; omit for the 5 most recent orders'),
});

export const purchaseSchema = z.object({
  voucher_code: z.string().optional().describe('Voucher code provided by the customer'),
});

/**
 * Validation for stored shipping details.
 */
export const shippingDetailsSchema = z.object({
  fullName: z.string().trim().min(1, 'Full name cannot be empty').max(255, 'Full name must be 255 characters or less'),
  address: z.string().trim().min(1, 'Address cannot be empty').max(500, 'Address must be 500 characters or less'),
  city: z.string().trim().min(1, 'City cannot be empty').max(100, 'City must be 100 characters or less'),
  zipCode: z.string().trim().min(1, 'Zip code cannot be empty').max(20, 'Zip code must be 20 characters or less'),
});

export function createOrderToolSchemas(facets: CatalogFacets) {
  return {
    search_products: createSearchProductsSchema(facets),
    add_to_cart: addToCartSchema,
    edit_item_in_cart: editItemInCartSchema,
    remove_from_cart: removeFromCartSchema,
    view_cart: emptyArgsSchema,
    get_shipping_info: emptyArgsSchema,
    create_shipping_info: createShippingInfoSchema,
    edit_shipping_info: editShippingInfoSchema,
    get_orders: getOrdersSchema,
    purchase: purchaseSchema,
  } satisfies Record<string, z.ZodType>;
}

export type OrderToolSchemas = ReturnType<typeof createOrderToolSchemas>;

export type OrderToolName = keyof OrderToolSchemas;

/**
 * One variant per tool, each carrying its validated arguments.
 */
export type OrderToolCall = {
  [N in OrderToolName]: { name: N; args: z.output<OrderToolSchemas[N]> };
}[OrderToolName];
