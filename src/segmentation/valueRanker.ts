import type { CustomerSpendSummary } from './types.js';

const DECILE_DIVISOR = 10;

function compareBySpend(a: CustomerSpendSummary, b: CustomerSpendSummary): number {
  if (a.totalSpend !== b.totalSpend) {
    return b.totalSpend - a.totalSpend;
  }
  // Code-unit comparison keeps the order locale independent
  if (a.customerId < b.customerId) return -1;
  if (a.customerId > b.customerId) return 1;
  return 0;
}

/** Spend descending, ties by customer id ascending. Does not mutate the input. */
export function rankBySpend(
  summaries: readonly CustomerSpendSummary[],
): CustomerSpendSummary[] {
  return [...summaries].sort(compareBySpend);
}

/**
 * Number of customers admitted to the top decile: ceil(N / 10), so any
 * non-empty population admits at least one.
 */
export function topDecileSize(count: number): number {
  if (count <= 0) return 0;
  return Math.ceil(count / DECILE_DIVISOR);
}

export function selectTopDecile(
  summaries: readonly CustomerSpendSummary[],
): CustomerSpendSummary[] {
  const ranked = rankBySpend(summaries);
  return ranked.slice(0, topDecileSize(ranked.length));
}
