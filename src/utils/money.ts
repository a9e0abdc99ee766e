// Money utilities using integer cents to avoid floating point issues

import { CURRENCY_CONFIG, type Currency } from '../config/env';

export function toCents(amount: number): number {
  return Math.round(amount);
}

export function toDecimal(cents: number): number {
  return cents / 100;
}

/**
 * Percentage of an amount in cents, rounded to the nearest cent
 */
export function percentOf(amountCents: number, percent: number): number {
  return toCents((amountCents * percent) / 100);
}

export function formatCents(cents: number, currency: Currency = 'USD'): string {
  const { code, decimals } = CURRENCY_CONFIG[currency];
  const formatter = new Intl.NumberFormat('en-US', {
    style: 'currency',
    currency: code,
    minimumFractionDigits: decimals,
    maximumFractionDigits: decimals
  });
  return formatter.format(toDecimal(cents));
}
