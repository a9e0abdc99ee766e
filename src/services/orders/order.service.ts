import type { DatabaseAdapter, WhereClause } from '../../db/types';
import type {
  CustomerCategory,
  Id,
  Invoice,
  Order,
  OrderItem,
  OrderStatus,
  Payment
} from '../../types/database';
import type { Clock } from '../../utils/datetime';
import { NotFoundError } from '../../utils/errors';
import { createChildLogger } from '../../utils/logger';
import { AuditService } from '../audit/audit.service';
import { BaseService } from '../base.service';
import { CatalogService } from '../catalog/catalog.service';
import { InventoryService, type StockMovement } from '../inventory/inventory.service';
import { InvoiceService } from '../invoices/invoice.service';
import { PaymentService } from '../payments/payment.service';
import { buildOrderDraft, validateOrderInput, type CreateOrderInput } from './order-builder';

const log = createChildLogger({ module: 'orders' });

// =============================================================================
// TYPES
// =============================================================================

export interface OrderSearchInput {
  status?: OrderStatus | OrderStatus[];
  customer_category?: CustomerCategory;
  from_date?: string;
  to_date?: string;
  limit?: number;
  offset?: number;
}

export interface OrderSearchResult {
  orders: Order[];
  total: number;
}

export interface CreatedOrder {
  order: Order;
  items: OrderItem[];
  lowStock: StockMovement[];
}

export interface OrderDetails {
  order: Order;
  items: OrderItem[];
  payments: Payment[];
  invoice: Invoice | null;
}

export interface OrderDependencies {
  catalog?: CatalogService;
  inventory?: InventoryService;
  audit?: AuditService;
  invoices?: InvoiceService;
  payments?: PaymentService;
}

// =============================================================================
// SERVICE
// =============================================================================

export class OrderService extends BaseService {
  private readonly catalog: CatalogService;
  private readonly inventory: InventoryService;
  private readonly audit: AuditService;
  private readonly invoices: InvoiceService;
  private readonly payments: PaymentService;

  constructor(databaseAdapter?: DatabaseAdapter, clock?: Clock, deps: OrderDependencies = {}) {
    super(databaseAdapter, clock);
    this.catalog = deps.catalog ?? new CatalogService(databaseAdapter, clock);
    this.inventory =
      deps.inventory ?? new InventoryService(databaseAdapter, clock, { catalog: this.catalog });
    this.audit = deps.audit ?? new AuditService(databaseAdapter, clock);
    this.invoices = deps.invoices ?? new InvoiceService(databaseAdapter, clock);
    this.payments =
      deps.payments ??
      new PaymentService(databaseAdapter, clock, { audit: this.audit, invoices: this.invoices });
  }

  /**
   * Create a priced order in one transaction.
   *
   * The order row is inserted PENDING with zero amounts, each item is inserted
   * while the inventory ledger draws down its recipe, the computed pricing is
   * written back and an ORDER_CREATED audit entry is appended. Any failure
   * leaves no trace of the order.
   */
  async createOrder(input: CreateOrderInput): Promise<CreatedOrder> {
    const validated = validateOrderInput(input);
    const timestamp = this.now();

    const created = await this.db.transaction((tx) => {
      const snapshot = this.catalog.resolveSnapshot(tx, {
        menuItemIds: validated.items.map((line) => line.menu_item_id),
        discountId: validated.discount_id,
        taxId: validated.tax_id
      });
      const draft = buildOrderDraft(validated, snapshot);

      const pending = tx.insert<Order>('orders', {
        customer_name: draft.customer_name,
        customer_category: draft.customer_category,
        status: 'PENDING',
        discount_id: draft.discount_id,
        tax_id: draft.tax_id,
        subtotal_cents: 0,
        discount_cents: 0,
        tax_cents: 0,
        total_cents: 0,
        created_at: timestamp,
        updated_at: timestamp
      });

      const items = tx.insertMany<OrderItem>(
        'order_items',
        draft.lines.map((line) => ({
          order_id: pending.id,
          menu_item_id: line.menu_item_id,
          quantity: line.quantity,
          unit_price_cents: line.unit_price_cents,
          line_total_cents: line.line_total_cents
        }))
      );

      const { lowStock } = this.inventory.consumeForItems(tx, draft.lines);

      const order = tx.update<Order>('orders', pending.id, {
        subtotal_cents: draft.pricing.subtotal_cents,
        discount_cents: draft.pricing.discount_cents,
        tax_cents: draft.pricing.tax_cents,
        total_cents: draft.pricing.total_cents
      });

      this.audit.append(
        tx,
        {
          actor_id: validated.actor_id,
          action: 'ORDER_CREATED',
          entity_type: 'orders',
          entity_id: order.id,
          details: `Order ${order.id} created with ${items.length} item(s)`
        },
        timestamp
      );

      return { order, items, lowStock };
    });

    log.info(
      {
        orderId: created.order.id,
        items: created.items.length,
        totalCents: created.order.total_cents
      },
      'Order created'
    );

    return created;
  }

  // ===========================================================================
  // READS
  // ===========================================================================

  /**
   * Search orders with filters, newest first. `total` counts every match,
   * not just the returned page.
   */
  async searchOrders(input: OrderSearchInput = {}): Promise<OrderSearchResult> {
    const where: WhereClause[] = [];

    if (input.status) {
      if (Array.isArray(input.status)) {
        where.push({ column: 'status', operator: 'in', value: input.status });
      } else {
        where.push({ column: 'status', operator: '=', value: input.status });
      }
    }

    if (input.customer_category) {
      where.push({ column: 'customer_category', operator: '=', value: input.customer_category });
    }

    if (input.from_date) {
      where.push({ column: 'created_at', operator: '>=', value: input.from_date });
    }

    if (input.to_date) {
      where.push({ column: 'created_at', operator: '<=', value: input.to_date });
    }

    const result = await this.db.select<Order>('orders', {
      where,
      orderBy: [{ column: 'id', direction: 'desc' }],
      ...(input.limit !== undefined && { limit: input.limit }),
      ...(input.offset !== undefined && { offset: input.offset })
    });

    if (result.error) {
      throw new Error(`Failed to search orders: ${result.error}`);
    }

    return {
      orders: result.data,
      total: result.count ?? result.data.length
    };
  }

  /**
   * Get a single order by ID
   */
  async getOrderById(id: Id): Promise<Order> {
    const result = await this.db.selectOne<Order>('orders', id);

    if (result.error || !result.data) {
      throw new NotFoundError('Order', id);
    }

    return result.data;
  }

  async getOrderItems(orderId: Id): Promise<OrderItem[]> {
    const result = await this.db.select<OrderItem>('order_items', {
      where: [{ column: 'order_id', operator: '=', value: orderId }],
      orderBy: [{ column: 'id', direction: 'asc' }]
    });

    if (result.error) {
      throw new Error(`Failed to fetch order items: ${result.error}`);
    }

    return result.data;
  }

  /**
   * Get order with items, payments and invoice
   */
  async getOrderWithDetails(orderId: Id): Promise<OrderDetails> {
    const order = await this.getOrderById(orderId);
    const [items, payments, invoice] = await Promise.all([
      this.getOrderItems(orderId),
      this.payments.getPaymentsForOrder(orderId),
      this.invoices.findInvoiceForOrder(orderId)
    ]);

    return { order, items, payments, invoice };
  }
}
