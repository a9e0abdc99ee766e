import { z } from 'zod';
import {
  CUSTOMER_CATEGORIES,
  type CustomerCategory,
  type Discount,
  type Id,
  type MenuItem,
  type Tax
} from '../../types/database';
import { ValidationError } from '../../utils/errors';
import { priceOrder, type OrderPricing } from '../pricing/pricing';

// =============================================================================
// INPUT
// =============================================================================

const idSchema = z.number().int().positive();

export const MAX_LINE_QUANTITY = 10_000;

export const orderLineSchema = z.object({
  menu_item_id: idSchema,
  quantity: z
    .number()
    .int('Quantity must be a whole number')
    .positive('Quantity must be greater than 0')
    .max(MAX_LINE_QUANTITY, `Quantity cannot exceed ${MAX_LINE_QUANTITY}`)
});

export const createOrderSchema = z.object({
  customer_name: z.string().trim().max(120).nullable().optional(),
  customer_category: z.enum(CUSTOMER_CATEGORIES).default('GENERAL'),
  items: z.array(orderLineSchema).min(1, 'Order must contain at least one item'),
  discount_id: idSchema.nullable().optional(),
  tax_id: idSchema.nullable().optional(),
  actor_id: idSchema.nullable().optional()
});

export type CreateOrderInput = z.input<typeof createOrderSchema>;
export type ValidatedOrderInput = z.output<typeof createOrderSchema>;

/**
 * Shape checks that need no lookups: a non-empty cart, positive whole
 * quantities and well-formed ids.
 */
export function validateOrderInput(input: unknown): ValidatedOrderInput {
  const result = createOrderSchema.safeParse(input);
  if (!result.success) {
    throw new ValidationError('Invalid order', result.error.errors);
  }
  return result.data;
}

// =============================================================================
// DRAFT
// =============================================================================

/**
 * Reference data resolved for one order
 */
export interface CatalogSnapshot {
  menuItems: Map<Id, MenuItem>;
  discount: Discount | null;
  tax: Tax | null;
}

export interface OrderDraftLine {
  menu_item_id: Id;
  quantity: number;
  unit_price_cents: number;
  line_total_cents: number;
}

export interface OrderDraft {
  customer_name: string | null;
  customer_category: CustomerCategory;
  discount_id: Id | null;
  tax_id: Id | null;
  lines: OrderDraftLine[];
  pricing: OrderPricing;
}

export function buildOrderDraft(input: ValidatedOrderInput, catalog: CatalogSnapshot): OrderDraft {
  const unresolved = input.items
    .filter((line) => catalog.menuItems.get(line.menu_item_id)?.is_active !== 1)
    .map((line) => ({ menu_item_id: line.menu_item_id }));

  if (unresolved.length > 0) {
    throw new ValidationError('Order references unknown or inactive menu items', unresolved);
  }

  const discountId = input.discount_id ?? null;
  if (discountId !== null && !catalog.discount) {
    throw new ValidationError(`Unknown discount ${discountId}`, [{ discount_id: discountId }]);
  }

  const taxId = input.tax_id ?? null;
  if (taxId !== null && !catalog.tax) {
    throw new ValidationError(`Unknown tax ${taxId}`, [{ tax_id: taxId }]);
  }

  const lines: OrderDraftLine[] = input.items.map((line) => {
    const unitPrice = catalog.menuItems.get(line.menu_item_id)?.price_cents ?? 0;
    return {
      menu_item_id: line.menu_item_id,
      quantity: line.quantity,
      unit_price_cents: unitPrice,
      line_total_cents: unitPrice * line.quantity
    };
  });

  const unsafeLines = lines
    .filter((line) => !Number.isSafeInteger(line.line_total_cents))
    .map((line) => ({ menu_item_id: line.menu_item_id, quantity: line.quantity }));

  if (unsafeLines.length > 0) {
    throw new ValidationError('Line total exceeds the supported amount', unsafeLines);
  }

  const subtotal = lines.reduce((sum, line) => sum + line.line_total_cents, 0);
  const pricing = priceOrder(subtotal, catalog.discount, catalog.tax, input.customer_category);

  if (!Object.values(pricing).every(Number.isSafeInteger)) {
    throw new ValidationError('Order total exceeds the supported amount', [pricing]);
  }

  return {
    customer_name: input.customer_name ?? null,
    customer_category: input.customer_category,
    discount_id: discountId,
    tax_id: taxId,
    lines,
    pricing
  };
}
