/**
 * Types for the high-value lapsed customer segmentation.
 *
 * Source records mirror the `customers`, `orders` and `order_items` tables.
 * Everything derived from them lives only for the duration of one run.
 */

export type OrderStatus =
  | 'pending'
  | 'processing'
  | 'on-hold'
  | 'completed'
  | 'cancelled'
  | 'refunded'
  | 'failed';

export const COMPLETED_STATUS: OrderStatus = 'completed';

// ── Source records ──────────────────────────────────────────────────

export interface Customer {
  id: string;
  name: string;
  email: string;
  registeredAt: Date;
}

export interface Order {
  id: string;
  customerId: string;
  status: string;
  createdAt: Date;
}

export interface OrderLineItem {
  id: string;
  orderId: string;
  productId: string | null;
  quantity: number;
  priceAtPurchase: number;
}

export interface CustomerIdentity {
  name: string;
  email: string;
}

/**
 * One line item flattened with its parent order. `orderId` and `customerId`
 * are null when the parent could not be resolved.
 */
export interface LineItemRow {
  lineItemId?: string;
  customerId: string | null;
  orderId: string | null;
  orderStatus: string | null;
  orderCreatedAt: Date | null;
  quantity: number;
  priceAtPurchase: number;
}

// ── Derived ─────────────────────────────────────────────────────────

export interface CustomerSpendSummary {
  customerId: string;
  totalSpend: number;
  lastCompletedOrderAt: Date;
  completedOrderCount: number;
}

export interface RecencyWindow {
  months: number;
  days: number;
}

export const DEFAULT_RECENCY_WINDOW: RecencyWindow = { months: 6, days: 0 };

// ── Output ──────────────────────────────────────────────────────────

export interface HighValueLapsedRecord {
  customerId: string;
  name: string;
  email: string;
  totalSpend: number;
  lastCompletedOrderAt: Date;
}

export interface SegmentationStats {
  qualifyingCustomers: number;
  topDecileSize: number;
  lapsedCustomers: number;
  cutoff: Date;
}

export interface SegmentationInput {
  rows: readonly LineItemRow[];
  customers: ReadonlyMap<string, CustomerIdentity>;
  referenceDate: Date;
  recencyWindow: RecencyWindow;
}

export interface SegmentationResult {
  records: HighValueLapsedRecord[];
  stats: SegmentationStats;
}
