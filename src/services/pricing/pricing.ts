import type { CustomerCategory, Discount, Tax } from '../../types/database';
import { percentOf } from '../../utils/money';

export type DiscountRule = Pick<Discount, 'type' | 'value' | 'applies_to'>;
export type TaxRule = Pick<Tax, 'rate'>;

export interface OrderPricing {
  subtotal_cents: number;
  discount_cents: number;
  tax_cents: number;
  total_cents: number;
}

/**
 * Discount owed on `subtotalCents` by a customer of `category`.
 *
 * A discount applies when it targets the customer's category or GENERAL.
 * PERCENT takes `value`% of the subtotal; FLAT takes `value` cents. Either is
 * capped at the subtotal.
 */
export function computeDiscount(
  subtotalCents: number,
  discount: DiscountRule | null | undefined,
  category: CustomerCategory
): number {
  if (!discount) {
    return 0;
  }
  if (discount.applies_to !== category && discount.applies_to !== 'GENERAL') {
    return 0;
  }
  const amount = discount.type === 'PERCENT' ? percentOf(subtotalCents, discount.value) : Math.round(discount.value);
  return Math.min(amount, subtotalCents);
}

export function computeTax(taxableCents: number, tax: TaxRule | null | undefined): number {
  if (!tax) {
    return 0;
  }
  return percentOf(taxableCents, tax.rate);
}

/**
 * Price an order. The discount is taken from the raw subtotal and tax is
 * charged on what remains after the discount.
 */
export function priceOrder(
  subtotalCents: number,
  discount: DiscountRule | null | undefined,
  tax: TaxRule | null | undefined,
  category: CustomerCategory
): OrderPricing {
  const discountCents = computeDiscount(subtotalCents, discount, category);
  const taxCents = computeTax(subtotalCents - discountCents, tax);

  return {
    subtotal_cents: subtotalCents,
    discount_cents: discountCents,
    tax_cents: taxCents,
    total_cents: subtotalCents - discountCents + taxCents
  };
}
