import { z } from 'zod';
import { config } from '../../config/env';
import type { DatabaseAdapter } from '../../db/types';
import { PAYMENT_METHODS, type Id, type Invoice, type Order, type Payment } from '../../types/database';
import type { Clock } from '../../utils/datetime';
import { NotFoundError, ValidationError } from '../../utils/errors';
import { createChildLogger } from '../../utils/logger';
import { formatCents } from '../../utils/money';
import { AuditService } from '../audit/audit.service';
import { BaseService } from '../base.service';
import { InvoiceService } from '../invoices/invoice.service';

const log = createChildLogger({ module: 'payments' });

// =============================================================================
// INPUT TYPES
// =============================================================================

export const recordPaymentSchema = z.object({
  order_id: z.number().int().positive(),
  amount_cents: z.number().int('Amount must be in whole cents').nonnegative('Amount cannot be negative'),
  method: z.enum(PAYMENT_METHODS),
  reference: z.string().trim().max(120).nullable().optional(),
  actor_id: z.number().int().positive().nullable().optional()
});

export type RecordPaymentInput = z.input<typeof recordPaymentSchema>;

export interface RecordedPayment {
  payment: Payment;
  invoice: Invoice;
  order: Order;
}

export interface PaymentDependencies {
  audit?: AuditService;
  invoices?: InvoiceService;
}

// =============================================================================
// SERVICE
// =============================================================================

export class PaymentService extends BaseService {
  private readonly audit: AuditService;
  private readonly invoices: InvoiceService;

  constructor(databaseAdapter?: DatabaseAdapter, clock?: Clock, deps: PaymentDependencies = {}) {
    super(databaseAdapter, clock);
    this.audit = deps.audit ?? new AuditService(databaseAdapter, clock);
    this.invoices = deps.invoices ?? new InvoiceService(databaseAdapter, clock);
  }

  /**
   * Record a payment for an order and issue its invoice in one transaction.
   *
   * Inserts the payment, the invoice (with a snapshot of the order total),
   * marks the order PAID and appends a PAYMENT audit entry. An order that
   * already has an invoice fails with ConstraintViolationError and nothing
   * from this call is kept.
   */
  async recordPayment(input: RecordPaymentInput): Promise<RecordedPayment> {
    const parsed = recordPaymentSchema.safeParse(input);
    if (!parsed.success) {
      throw new ValidationError('Invalid payment', parsed.error.errors);
    }
    const data = parsed.data;
    const paidAt = this.clock();
    const timestamp = paidAt.toISOString();

    const recorded = await this.db.transaction((tx) => {
      const order = tx.selectOne<Order>('orders', data.order_id);
      if (!order) {
        throw new NotFoundError('Order', data.order_id);
      }

      if (data.amount_cents !== order.total_cents) {
        log.warn(
          {
            orderId: order.id,
            amount: formatCents(data.amount_cents, config.billing.currency),
            total: formatCents(order.total_cents, config.billing.currency)
          },
          'Payment amount differs from order total'
        );
      }

      const payment = tx.insert<Payment>('payments', {
        order_id: order.id,
        amount_cents: data.amount_cents,
        method: data.method,
        reference: data.reference ?? null,
        paid_at: timestamp
      });

      const invoice = this.invoices.issue(tx, { order, paymentId: payment.id, issuedAt: paidAt });

      const paidOrder = tx.update<Order>('orders', order.id, {
        status: 'PAID',
        updated_at: timestamp
      });

      this.audit.append(
        tx,
        {
          actor_id: data.actor_id,
          action: 'PAYMENT',
          entity_type: 'orders',
          entity_id: order.id,
          details: `Payment ${payment.id} recorded`
        },
        timestamp
      );

      return { payment, invoice, order: paidOrder };
    });

    log.info(
      {
        orderId: recorded.order.id,
        paymentId: recorded.payment.id,
        invoiceNumber: recorded.invoice.invoice_number,
        amount: formatCents(recorded.payment.amount_cents, config.billing.currency)
      },
      'Payment recorded'
    );

    return recorded;
  }

  /**
   * Get payments for an order, oldest first
   */
  async getPaymentsForOrder(orderId: Id): Promise<Payment[]> {
    const result = await this.db.select<Payment>('payments', {
      where: [{ column: 'order_id', operator: '=', value: orderId }],
      orderBy: [{ column: 'id', direction: 'asc' }]
    });

    if (result.error) {
      throw new Error(`Failed to fetch payments: ${result.error}`);
    }

    return result.data;
  }
}
