// Row types for the billing schema (see db/schema.ts)

export type Id = number;
export type Timestamp = string; // ISO 8601 format

// =============================================================================
// ENUMS
// =============================================================================

export const CUSTOMER_CATEGORIES = ['GENERAL', 'STUDENT', 'STAFF', 'LOYAL'] as const;
export type CustomerCategory = (typeof CUSTOMER_CATEGORIES)[number];

// CANCELLED is a valid stored state, but no operation transitions into it
export const ORDER_STATUSES = ['PENDING', 'PAID', 'CANCELLED'] as const;
export type OrderStatus = (typeof ORDER_STATUSES)[number];

export const DISCOUNT_TYPES = ['PERCENT', 'FLAT'] as const;
export type DiscountType = (typeof DISCOUNT_TYPES)[number];

export const PAYMENT_METHODS = ['CASH', 'CARD', 'MFS'] as const;
export type PaymentMethod = (typeof PAYMENT_METHODS)[number];

export const AUDIT_ACTIONS = ['ORDER_CREATED', 'PAYMENT'] as const;
export type AuditAction = (typeof AUDIT_ACTIONS)[number];

// =============================================================================
// REFERENCE DATA (read-only for the billing flow)
// =============================================================================

export interface MenuItem {
  id: Id;
  name: string;
  price_cents: number;
  is_active: 0 | 1;
}

export interface Ingredient {
  id: Id;
  name: string;
  unit: string;
  min_threshold: number;
}

/**
 * How much of one ingredient a single unit of a menu item consumes
 */
export interface RecipeLine {
  id: Id;
  menu_item_id: Id;
  ingredient_id: Id;
  quantity_per_unit: number;
}

export interface Discount {
  id: Id;
  name: string;
  type: DiscountType;
  /** Percent for PERCENT, cents for FLAT */
  value: number;
  /** GENERAL applies to every customer category */
  applies_to: CustomerCategory;
}

export interface Tax {
  id: Id;
  name: string;
  /** Percent */
  rate: number;
}

// =============================================================================
// ORDERS
// =============================================================================

export interface Order {
  id: Id;
  customer_name: string | null;
  customer_category: CustomerCategory;
  status: OrderStatus;
  discount_id: Id | null;
  tax_id: Id | null;
  subtotal_cents: number;
  discount_cents: number;
  tax_cents: number;
  total_cents: number;
  created_at: Timestamp;
  updated_at: Timestamp;
}

export interface OrderItem {
  id: Id;
  order_id: Id;
  menu_item_id: Id;
  quantity: number;
  unit_price_cents: number;
  line_total_cents: number;
}

// =============================================================================
// SETTLEMENT
// =============================================================================

export interface Payment {
  id: Id;
  order_id: Id;
  amount_cents: number;
  method: PaymentMethod;
  reference: string | null;
  paid_at: Timestamp;
}

export interface Invoice {
  id: Id;
  order_id: Id;
  invoice_number: string;
  payment_id: Id | null;
  total_cents: number;
  issued_at: Timestamp;
}

// =============================================================================
// INVENTORY & AUDIT
// =============================================================================

export interface InventoryItem {
  id: Id;
  ingredient_id: Id;
  quantity: number;
  last_updated: Timestamp;
}

export interface AuditLogEntry {
  id: Id;
  actor_id: Id | null;
  action: AuditAction;
  entity_type: string;
  entity_id: Id | null;
  details: string | null;
  created_at: Timestamp;
}
