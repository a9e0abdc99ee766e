import { config } from '../../config/env';
import type { DatabaseAdapter, TransactionContext } from '../../db/types';
import type { Id, Invoice, Order } from '../../types/database';
import type { Clock } from '../../utils/datetime';
import { NotFoundError } from '../../utils/errors';
import { BaseService } from '../base.service';
import { formatInvoiceNumber } from './invoice-number';

export interface IssueInvoiceInput {
  order: Order;
  paymentId: Id;
  issuedAt: Date;
}

export class InvoiceService extends BaseService {
  private readonly timezone: string;

  constructor(databaseAdapter?: DatabaseAdapter, clock?: Clock, timezone?: string) {
    super(databaseAdapter, clock);
    this.timezone = timezone ?? config.billing.invoiceTimezone;
  }

  /**
   * Insert the invoice for an order inside the caller's transaction. The
   * unique order_id and invoice_number columns reject a second invoice.
   */
  issue(tx: TransactionContext, input: IssueInvoiceInput): Invoice {
    return tx.insert<Invoice>('invoices', {
      order_id: input.order.id,
      invoice_number: formatInvoiceNumber(input.order.id, input.issuedAt, this.timezone),
      payment_id: input.paymentId,
      total_cents: input.order.total_cents,
      issued_at: input.issuedAt.toISOString()
    });
  }

  async findInvoiceForOrder(orderId: Id): Promise<Invoice | null> {
    const result = await this.db.select<Invoice>('invoices', {
      where: [{ column: 'order_id', operator: '=', value: orderId }],
      limit: 1
    });

    if (result.error) {
      throw new Error(`Failed to fetch invoice: ${result.error}`);
    }

    return result.data[0] ?? null;
  }

  async getInvoiceForOrder(orderId: Id): Promise<Invoice> {
    const invoice = await this.findInvoiceForOrder(orderId);
    if (!invoice) {
      throw new NotFoundError('Invoice for order', orderId);
    }
    return invoice;
  }

  async getInvoiceByNumber(invoiceNumber: string): Promise<Invoice> {
    const result = await this.db.select<Invoice>('invoices', {
      where: [{ column: 'invoice_number', operator: '=', value: invoiceNumber }],
      limit: 1
    });

    if (result.error) {
      throw new Error(`Failed to fetch invoice: ${result.error}`);
    }

    const [invoice] = result.data;
    if (!invoice) {
      throw new NotFoundError('Invoice', invoiceNumber);
    }

    return invoice;
  }
}
