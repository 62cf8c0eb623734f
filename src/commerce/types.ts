export interface Product {
  id: number;
  name: string;
  sku: string | null;
  description: string | null;
  /** null when the catalog row has no price */
  priceCents: number | null;
  stockQuantity: number;
  category: string | null;
  brand: string | null;
  primaryImage: string | null;
  isActive: boolean;
  isFeatured: boolean;
}

/** Distinct category and brand values of the active catalog */
export interface CatalogFacets {
  categories: string[];
  brands: string[];
}

export interface ShippingDetails {
  fullName: string;
  address: string;
  city: string;
  zipCode: string;
}

export interface ShippingInfo extends ShippingDetails {
  sessionId: string;
  createdAt: Date;
  updatedAt: Date;
}

export interface Voucher {
  code: string;
  amountCents: number;
  isUsed: boolean;
  generatedBySession: string | null;
  usedBySession: string | null;
  createdAt: Date;
  usedAt: Date | null;
  expiresAt: Date | null;
}

export interface NewVoucher {
  code: string;
  amountCents: number;
  generatedBySession: string;
  expiresAt?: Date | null;
}

/** Frozen snapshot of a cart line at purchase time */
export interface OrderItem {
  productId: number;
  productName: string;
  quantity: number;
  unitPriceCents: number;
  subtotalCents: number;
}

export type OrderStatus = 'completed' | 'pending' | 'cancelled';

export interface Order {
  id: number;
  sessionId: string;
  voucherCode: string | null;
  totalCents: number;
  status: OrderStatus;
  createdAt: Date;
  items: OrderItem[];
}

export interface NewOrder {
  sessionId: string;
  voucherCode: string;
  totalCents: number;
  status: OrderStatus;
  items: OrderItem[];
}
