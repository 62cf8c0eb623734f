import {
  boolean,
  index,
  integer,
  jsonb,
  numeric,
  pgTable,
  serial,
  text,
  timestamp,
  uniqueIndex,
  varchar,
  vector,
} from 'drizzle-orm/pg-core';

/**
 * Catalog. Read-only from this service; populated by the import pipeline.
 */
export const products = pgTable('products', {
  id: serial('id').primaryKey(),
  name: varchar('name', { length: 255 }).notNull(),
  sku: varchar('sku', { length: 100 }),
  description: text('description'),
  price: numeric('price', { precision: 10, scale: 2 }),
  stockQuantity: integer('stock_quantity').notNull().default(0),
  category: varchar('category', { length: 100 }),
  brand: varchar('brand', { length: 100 }),
  primaryImage: text('primary_image'),
  isActive: boolean('is_active').notNull().default(true),
  isFeatured: boolean('is_featured').notNull().default(false),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
});

export const vouchers = pgTable(
  'vouchers',
  {
    id: serial('id').primaryKey(),
    code: varchar('code', { length: 64 }).notNull(),
    amount: numeric('amount', { precision: 10, scale: 2 }).notNull(),
    isUsed: boolean('is_used').notNull().default(false),
    generatedBySession: varchar('generated_by_session', { length: 64 }),
    usedBySession: varchar('used_by_session', { length: 64 }),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    usedAt: timestamp('used_at', { withTimezone: true }),
    expiresAt: timestamp('expires_at', { withTimezone: true }),
  },
  (t) => [
    uniqueIndex('vouchers_code_uniq').on(t.code),
    index('vouchers_generated_by_idx').on(t.generatedBySession),
  ]
);

export const orders = pgTable(
  'orders',
  {
    id: serial('id').primaryKey(),
    sessionId: varchar('session_id', { length: 64 }).notNull(),
    // The idempotency key: one order per voucher
    voucherCode: varchar('voucher_code', { length: 64 }).references(() => vouchers.code),
    totalAmount: numeric('total_amount', { precision: 10, scale: 2 }).notNull(),
    status: varchar('status', { length: 32 }).notNull().default('completed'),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (t) => [
    uniqueIndex('orders_voucher_code_uniq').on(t.voucherCode),
    index('orders_session_idx').on(t.sessionId, t.createdAt),
  ]
);

export const orderItems = pgTable(
  'order_items',
  {
    id: serial('id').primaryKey(),
    orderId: integer('order_id')
      .notNull()
      .references(() => orders.id, { onDelete: 'cascade' }),
    productId: integer('product_id').notNull(),
    productName: varchar('product_name', { length: 255 }).notNull(),
    quantity: integer('quantity').notNull(),
    unitPrice: numeric('unit_price', { precision: 10, scale: 2 }).notNull(),
    subtotal: numeric('subtotal', { precision: 10, scale: 2 }).notNull(),
  },
  (t) => [index('order_items_order_idx').on(t.orderId)]
);

export const shippingInfo = pgTable(
  'shipping_info',
  {
    id: serial('id').primaryKey(),
    sessionId: varchar('session_id', { length: 64 }).notNull(),
    fullName: varchar('full_name', { length: 255 }).notNull(),
    address: varchar('address', { length: 500 }).notNull(),
    city: varchar('city', { length: 100 }).notNull(),
    zipCode: varchar('zip_code', { length: 20 }).notNull(),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (t) => [uniqueIndex('shipping_info_session_uniq').on(t.sessionId)]
);

export type DocumentMetadata = Record<string, string | number | boolean | null>;

/**
 * Embedded chunks for similarity search, one collection per corpus
 * (product catalog, customer handbook). Metadata is flat.
 */
export const documents = pgTable(
  'documents',
  {
    id: serial('id').primaryKey(),
    collection: varchar('collection', { length: 64 }).notNull(),
    content: text('content').notNull(),
    metadata: jsonb('metadata').$type<DocumentMetadata>().notNull().default({}),
    embedding: vector('embedding', { dimensions: 1536 }).notNull(),
  },
  (t) => [index('documents_collection_idx').on(t.collection)]
);

export type ProductRow = typeof products.$inferSelect;
export type VoucherRow = typeof vouchers.$inferSelect;
export type OrderRow = typeof orders.$inferSelect;
export type OrderItemRow = typeof orderItems.$inferSelect;
export type ShippingInfoRow = typeof shippingInfo.$inferSelect;
