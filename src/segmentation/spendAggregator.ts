import { DataIntegrityError } from '../utils/errors.js';
import {
  COMPLETED_STATUS,
  type Customer,
  type CustomerIdentity,
  type CustomerSpendSummary,
  type LineItemRow,
  type Order,
  type OrderLineItem,
} from './types.js';

interface SpendAccumulator {
  spendCents: number;
  lastCompletedOrderAt: Date;
  orderIds: Set<string>;
}

export function toCents(amount: number): number {
  return Math.round(amount * 100);
}

export function fromCents(cents: number): number {
  return cents / 100;
}

function describeRow(row: LineItemRow, index: number): string {
  return row.lineItemId ?? `row #${index}`;
}

function isValidDate(value: Date | null): value is Date {
  return value instanceof Date && !Number.isNaN(value.getTime());
}

function assertValidRow(
  row: LineItemRow,
  index: number,
): asserts row is LineItemRow & {
  orderId: string;
  customerId: string;
  orderStatus: string;
  orderCreatedAt: Date;
} {
  const itemId = describeRow(row, index);

  if (!row.orderId) {
    throw new DataIntegrityError(`Line item ${itemId} references a non-existent order`, {
      entity: 'order_item',
      entityId: itemId,
    });
  }
  if (!row.customerId) {
    throw new DataIntegrityError(`Order ${row.orderId} references a non-existent customer`, {
      entity: 'order',
      entityId: row.orderId,
    });
  }
  if (!row.orderStatus) {
    throw new DataIntegrityError(`Order ${row.orderId} has no status`, {
      entity: 'order',
      entityId: row.orderId,
    });
  }
  if (!isValidDate(row.orderCreatedAt)) {
    throw new DataIntegrityError(`Order ${row.orderId} has an invalid creation timestamp`, {
      entity: 'order',
      entityId: row.orderId,
    });
  }
  if (!Number.isInteger(row.quantity) || row.quantity <= 0) {
    throw new DataIntegrityError(
      `Line item ${itemId} has invalid quantity ${row.quantity}: must be a positive integer`,
      { entity: 'order_item', entityId: itemId },
    );
  }
  if (!Number.isFinite(row.priceAtPurchase) || row.priceAtPurchase <= 0) {
    throw new DataIntegrityError(
      `Line item ${itemId} has invalid price ${row.priceAtPurchase}: must be positive`,
      { entity: 'order_item', entityId: itemId },
    );
  }
}

/**
 * Reduce line items to one spend summary per customer, counting only items
 * whose parent order is completed.
 *
 * Customers without a completed order, or whose completed spend rounds to
 * zero, are not emitted. Summaries come back ordered by customer id.
 *
 * When a customer directory is given, every row's customer must be in it,
 * whatever the order status.
 */
export function aggregateSpend(
  rows: readonly LineItemRow[],
  customers?: ReadonlyMap<string, CustomerIdentity>,
): CustomerSpendSummary[] {
  const byCustomer = new Map<string, SpendAccumulator>();

  rows.forEach((row, index) => {
    assertValidRow(row, index);

    if (customers && !customers.has(row.customerId)) {
      throw new DataIntegrityError(
        `Order ${row.orderId} references a non-existent customer ${row.customerId}`,
        { entity: 'order', entityId: row.orderId },
      );
    }

    if (row.orderStatus !== COMPLETED_STATUS) {
      return;
    }

    const lineCents = toCents(row.priceAtPurchase) * row.quantity;
    const acc = byCustomer.get(row.customerId);

    if (!acc) {
      byCustomer.set(row.customerId, {
        spendCents: lineCents,
        lastCompletedOrderAt: row.orderCreatedAt,
        orderIds: new Set([row.orderId]),
      });
      return;
    }

    acc.spendCents += lineCents;
    acc.orderIds.add(row.orderId);
    if (row.orderCreatedAt.getTime() > acc.lastCompletedOrderAt.getTime()) {
      acc.lastCompletedOrderAt = row.orderCreatedAt;
    }
  });

  const summaries: CustomerSpendSummary[] = [];
  for (const [customerId, acc] of byCustomer) {
    if (acc.spendCents <= 0) continue;
    summaries.push({
      customerId,
      totalSpend: fromCents(acc.spendCents),
      lastCompletedOrderAt: acc.lastCompletedOrderAt,
      completedOrderCount: acc.orderIds.size,
    });
  }

  return summaries.sort((a, b) =>
    a.customerId < b.customerId ? -1 : a.customerId > b.customerId ? 1 : 0,
  );
}

/**
 * Flatten separately loaded record sets into line item rows, resolving each
 * item's order and each order's customer through id-keyed maps.
 *
 * For callers holding the three tables as arrays; the database read already
 * returns joined rows and goes straight to `aggregateSpend`.
 */
export function joinLineItems(
  customers: readonly Customer[],
  orders: readonly Order[],
  lineItems: readonly OrderLineItem[],
): LineItemRow[] {
  const customerIds = new Set(customers.map((c) => c.id));
  const ordersById = new Map<string, Order>();

  for (const order of orders) {
    if (!customerIds.has(order.customerId)) {
      throw new DataIntegrityError(
        `Order ${order.id} references a non-existent customer ${order.customerId}`,
        { entity: 'order', entityId: order.id },
      );
    }
    ordersById.set(order.id, order);
  }

  return lineItems.map((item) => {
    const order = ordersById.get(item.orderId);
    if (!order) {
      throw new DataIntegrityError(
        `Line item ${item.id} references a non-existent order ${item.orderId}`,
        { entity: 'order_item', entityId: item.id },
      );
    }
    return {
      lineItemId: item.id,
      customerId: order.customerId,
      orderId: order.id,
      orderStatus: order.status,
      orderCreatedAt: order.createdAt,
      quantity: item.quantity,
      priceAtPurchase: item.priceAtPurchase,
    };
  });
}
