import type { Knex } from 'knex';
import { logger } from '../utils/logger.js';
import { COMPLETED_STATUS, type CustomerIdentity, type LineItemRow } from '../segmentation/types.js';

export interface RecordSourceDeps {
  readonlyDb: Knex;
}

/** Line items and the customer directory as of one database snapshot. */
export interface RecordSnapshot {
  rows: LineItemRow[];
  customers: Map<string, CustomerIdentity>;
}

interface RawLineItemRow {
  line_item_id: string;
  customer_id: string | null;
  order_id: string | null;
  order_status: string | null;
  order_created_at: Date | string | null;
  quantity: number | string;
  price_at_purchase: number | string;
}

interface RawCustomerRow {
  id: string;
  name: string | null;
  email: string;
}

function toDate(value: Date | string | null): Date | null {
  if (value === null) return null;
  return value instanceof Date ? value : new Date(value);
}

function toLineItemRow(row: RawLineItemRow): LineItemRow {
  return {
    lineItemId: row.line_item_id,
    customerId: row.customer_id,
    orderId: row.order_id,
    orderStatus: row.order_status,
    orderCreatedAt: toDate(row.order_created_at),
    quantity: Number(row.quantity),
    // numeric columns come back from pg as strings
    priceAtPurchase: parseFloat(String(row.price_at_purchase)),
  };
}

export function createRecordSource(deps: RecordSourceDeps) {
  const { readonlyDb } = deps;

  /**
   * Line items of completed orders, plus any line item whose order row is
   * missing so the aggregator can report it instead of dropping it.
   */
  async function fetchCompletedOrderLineItems(executor: Knex = readonlyDb): Promise<LineItemRow[]> {
    const startTime = Date.now();

    const rows = await executor('order_items as oi')
      .leftJoin('orders as o', 'o.id', 'oi.order_id')
      .where((qb) => {
        qb.where('o.status', COMPLETED_STATUS).orWhereNull('o.id');
      })
      .orderBy('oi.id', 'asc')
      .select<RawLineItemRow[]>(
        'oi.id as line_item_id',
        'o.customer_id as customer_id',
        'o.id as order_id',
        'o.status as order_status',
        'o.date_created as order_created_at',
        'oi.quantity as quantity',
        'oi.price_at_purchase as price_at_purchase',
      );

    logger.debug(
      { rowCount: rows.length, durationMs: Date.now() - startTime },
      'Record source: line items fetched',
    );

    return rows.map(toLineItemRow);
  }

  async function fetchCustomers(executor: Knex = readonlyDb): Promise<Map<string, CustomerIdentity>> {
    const rows = await executor('customers')
      .orderBy('id', 'asc')
      .select<RawCustomerRow[]>('id', 'name', 'email');

    const customers = new Map<string, CustomerIdentity>();
    for (const row of rows) {
      customers.set(row.id, { name: row.name ?? '', email: row.email });
    }

    logger.debug({ customerCount: customers.size }, 'Record source: customers fetched');

    return customers;
  }

  /** Both reads against one read-only REPEATABLE READ snapshot. */
  async function readSnapshot(): Promise<RecordSnapshot> {
    return readonlyDb.transaction(
      async (trx) => {
        const rows = await fetchCompletedOrderLineItems(trx);
        const customers = await fetchCustomers(trx);
        return { rows, customers };
      },
      { isolationLevel: 'repeatable read', readOnly: true },
    );
  }

  return {
    fetchCompletedOrderLineItems,
    fetchCustomers,
    readSnapshot,
  };
}

export type RecordSource = ReturnType<typeof createRecordSource>;
