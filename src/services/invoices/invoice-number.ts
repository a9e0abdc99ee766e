import type { Id } from '../../types/database';
import { formatDateKey } from '../../utils/datetime';

export const INVOICE_PREFIX = 'INV';

/**
 * `INV-<YYYYMMDD>-<order id padded to 6>`. The date is the issue date in
 * `timezone`; ids longer than six digits are kept whole.
 */
export function formatInvoiceNumber(orderId: Id, issuedAt: Date, timezone = 'UTC'): string {
  return `${INVOICE_PREFIX}-${formatDateKey(issuedAt, timezone)}-${String(orderId).padStart(6, '0')}`;
}
