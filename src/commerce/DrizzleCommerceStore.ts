import { and, asc, desc, eq, inArray, isNotNull } from 'drizzle-orm';
import { DatabaseError, type Pool } from 'pg';
import pino from 'pino';
import { toCents, fromCents } from '../cart/money.js';
import type { AppDb, DbExecutor } from '../db/client.js';
import {
  orderItems,
  orders,
  products,
  shippingInfo,
  vouchers,
  type OrderItemRow,
  type OrderRow,
  type ProductRow,
  type ShippingInfoRow,
  type VoucherRow,
} from '../db/schema.js';
import { AppError } from '../errors/AppError.js';
import type { CommerceTransaction, ICommerceStore, UpsertShippingResult } from './ICommerceStore.js';
import type {
  CatalogFacets,
  NewOrder,
  NewVoucher,
  Order,
  OrderStatus,
  Product,
  ShippingDetails,
  ShippingInfo,
  Voucher,
} from './types.js';

const logger = pino({ name: 'DrizzleCommerceStore' });

const ORDER_STATUSES: readonly OrderStatus[] = ['completed', 'pending', 'cancelled'];

function toOrderStatus(value: string): OrderStatus {
  return ORDER_STATUSES.find((status) => status === value) ?? 'pending';
}

function toProduct(row: ProductRow): Product {
  return {
    id: row.id,
    name: row.name,
    sku: row.sku,
    description: row.description,
    priceCents: row.price === null ? null : toCents(row.price),
    stockQuantity: row.stockQuantity,
    category: row.category,
    brand: row.brand,
    primaryImage: row.primaryImage,
    isActive: row.isActive,
    isFeatured: row.isFeatured,
  };
}

function toVoucher(row: VoucherRow): Voucher {
  return {
    code: row.code,
    amountCents: toCents(row.amount),
    isUsed: row.isUsed,
    generatedBySession: row.generatedBySession,
    usedBySession: row.usedBySession,
    createdAt: row.createdAt,
    usedAt: row.usedAt,
    expiresAt: row.expiresAt,
  };
}

function presentValues(rows: Array<{ value: string | null }>): string[] {
  return rows.flatMap((row) => (row.value ? [row.value] : []));
}

function toShippingInfo(row: ShippingInfoRow): ShippingInfo {
  return {
    sessionId: row.sessionId,
    fullName: row.fullName,
    address: row.address,
    city: row.city,
    zipCode: row.zipCode,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

function toOrder(row: OrderRow, items: OrderItemRow[]): Order {
  return {
    id: row.id,
    sessionId: row.sessionId,
    voucherCode: row.voucherCode,
    totalCents: toCents(row.totalAmount),
    status: toOrderStatus(row.status),
    createdAt: row.createdAt,
    items: items.map((item) => ({
      productId: item.productId,
      productName: item.productName,
      quantity: item.quantity,
      unitPriceCents: toCents(item.unitPrice),
      subtotalCents: toCents(item.subtotal),
    })),
  };
}

/**
 * Find the driver error behind whatever the ORM threw.
 */
function findDatabaseError(error: unknown): DatabaseError | null {
  let current: unknown = error;
  for (let depth = 0; depth < 3 && current instanceof Error; depth++) {
    if (current instanceof DatabaseError) {
      return current;
    }
    current = current.cause;
  }
  return null;
}

function translateError(error: unknown): unknown {
  if (error instanceof AppError) {
    return error;
  }
  const dbError = findDatabaseError(error);
  if (dbError?.code === '23505') {
    return AppError.uniqueViolation(dbError.constraint, dbError);
  }
  return error;
}

async function loadOrdersWithItems(executor: DbExecutor, rows: OrderRow[]): Promise<Order[]> {
  if (rows.length === 0) {
    return [];
  }
  const itemRows = await executor
    .select()
    .from(orderItems)
    .where(inArray(orderItems.orderId, rows.map((row) => row.id)))
    .orderBy(orderItems.id);

  return rows.map((row) => toOrder(row, itemRows.filter((item) => item.orderId === row.id)));
}

async function findOrderByVoucherCode(executor: DbExecutor, code: string): Promise<Order | null> {
  const rows = await executor.select().from(orders).where(eq(orders.voucherCode, code)).limit(1);
  const [order] = await loadOrdersWithItems(executor, rows);
  return order ?? null;
}

class DrizzleTransaction implements CommerceTransaction {
  constructor(private readonly tx: DbExecutor) {}

  async findVoucher(code: string): Promise<Voucher | null> {
    // Lock the voucher row for the rest of the purchase attempt
    const rows = await this.tx.select().from(vouchers).where(eq(vouchers.code, code)).limit(1).for('update');
    const row = rows[0];
    return row ? toVoucher(row) : null;
  }

  findOrderByVoucher(code: string): Promise<Order | null> {
    return findOrderByVoucherCode(this.tx, code);
  }

  async insertOrder(order: NewOrder): Promise<Order> {
    const [row] = await this.tx
      .insert(orders)
      .values({
        sessionId: order.sessionId,
        voucherCode: order.voucherCode,
        totalAmount: fromCents(order.totalCents),
        status: order.status,
      })
      .returning();
    if (!row) {
      throw AppError.database('Order insert returned no row');
    }

    const itemRows = order.items.length === 0
      ? []
      : await this.tx
        .insert(orderItems)
        .values(order.items.map((item) => ({
          orderId: row.id,
          productId: item.productId,
          productName: item.productName,
          quantity: item.quantity,
          unitPrice: fromCents(item.unitPriceCents),
          subtotal: fromCents(item.subtotalCents),
        })))
        .returning();

    return toOrder(row, itemRows);
  }

  async markVoucherUsed(code: string, sessionId: string, usedAt: Date): Promise<void> {
    await this.tx
      .update(vouchers)
      .set({ isUsed: true, usedBySession: sessionId, usedAt })
      .where(eq(vouchers.code, code));
  }
}

/**
 * Postgres-backed commerce store (Drizzle over node-postgres).
 */
export class DrizzleCommerceStore implements ICommerceStore {
  constructor(
    private readonly db: AppDb,
    private readonly pool?: Pool
  ) {}

  async getProduct(productId: number): Promise<Product | null> {
    const rows = await this.db.select().from(products).where(eq(products.id, productId)).limit(1);
    const row = rows[0];
    return row ? toProduct(row) : null;
  }

  async getCatalogFacets(): Promise<CatalogFacets> {
    const [categoryRows, brandRows] = await Promise.all([
      this.db
        .selectDistinct({ value: products.category })
        .from(products)
        .where(and(eq(products.isActive, true), isNotNull(products.category)))
        .orderBy(asc(products.category)),
      this.db
        .selectDistinct({ value: products.brand })
        .from(products)
        .where(and(eq(products.isActive, true), isNotNull(products.brand)))
        .orderBy(asc(products.brand)),
    ]);
    return { categories: presentValues(categoryRows), brands: presentValues(brandRows) };
  }

  async getShippingInfo(sessionId: string): Promise<ShippingInfo | null> {
    const rows = await this.db.select().from(shippingInfo).where(eq(shippingInfo.sessionId, sessionId)).limit(1);
    const row = rows[0];
    return row ? toShippingInfo(row) : null;
  }

  async upsertShippingInfo(sessionId: string, details: ShippingDetails): Promise<UpsertShippingResult> {
    const existing = await this.getShippingInfo(sessionId);
    const now = new Date();
    const [row] = await this.db
      .insert(shippingInfo)
      .values({ sessionId, ...details })
      .onConflictDoUpdate({
        target: shippingInfo.sessionId,
        set: { ...details, updatedAt: now },
      })
      .returning();
    if (!row) {
      throw AppError.database('Shipping info upsert returned no row');
    }
    return { info: toShippingInfo(row), created: existing === null };
  }

  async updateShippingInfo(sessionId: string, patch: Partial<ShippingDetails>): Promise<ShippingInfo | null> {
    const [row] = await this.db
      .update(shippingInfo)
      .set({ ...patch, updatedAt: new Date() })
      .where(eq(shippingInfo.sessionId, sessionId))
      .returning();
    return row ? toShippingInfo(row) : null;
  }

  async getOrder(sessionId: string, orderId: number): Promise<Order | null> {
    const rows = await this.db
      .select()
      .from(orders)
      .where(and(eq(orders.id, orderId), eq(orders.sessionId, sessionId)))
      .limit(1);
    const [order] = await loadOrdersWithItems(this.db, rows);
    return order ?? null;
  }

  async listOrders(sessionId: string, limit?: number): Promise<Order[]> {
    const query = this.db
      .select()
      .from(orders)
      .where(eq(orders.sessionId, sessionId))
      .orderBy(desc(orders.createdAt), desc(orders.id));
    const rows = limit === undefined ? await query : await query.limit(limit);
    return loadOrdersWithItems(this.db, rows);
  }

  findOrderByVoucher(code: string): Promise<Order | null> {
    return findOrderByVoucherCode(this.db, code);
  }

  async findUnusedVoucherForSession(sessionId: string): Promise<Voucher | null> {
    const rows = await this.db
      .select()
      .from(vouchers)
      .where(and(eq(vouchers.generatedBySession, sessionId), eq(vouchers.isUsed, false)))
      .orderBy(desc(vouchers.createdAt))
      .limit(1);
    const row = rows[0];
    return row ? toVoucher(row) : null;
  }

  async createVoucher(voucher: NewVoucher): Promise<Voucher> {
    try {
      const [row] = await this.db
        .insert(vouchers)
        .values({
          code: voucher.code,
          amount: fromCents(voucher.amountCents),
          generatedBySession: voucher.generatedBySession,
          expiresAt: voucher.expiresAt ?? null,
        })
        .returning();
      if (!row) {
        throw AppError.database('Voucher insert returned no row');
      }
      return toVoucher(row);
    } catch (error) {
      throw translateError(error);
    }
  }

  async transaction<T>(fn: (tx: CommerceTransaction) => Promise<T>): Promise<T> {
    try {
      return await this.db.transaction((tx) => fn(new DrizzleTransaction(tx)));
    } catch (error) {
      const translated = translateError(error);
      if (translated instanceof AppError && translated.code === 'DATABASE_UNIQUE_VIOLATION') {
        logger.info({ constraint: translated.details?.constraint }, 'Transaction rolled back on unique violation');
      }
      throw translated;
    }
  }

  async close(): Promise<void> {
    await this.pool?.end();
  }
}
