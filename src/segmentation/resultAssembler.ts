import { DataIntegrityError } from '../utils/errors.js';
import type { CustomerIdentity, CustomerSpendSummary, HighValueLapsedRecord } from './types.js';

export function assembleResults(
  filtered: readonly CustomerSpendSummary[],
  customers: ReadonlyMap<string, CustomerIdentity>,
): HighValueLapsedRecord[] {
  return filtered.map((summary) => {
    const customer = customers.get(summary.customerId);
    if (!customer) {
      throw new DataIntegrityError(
        `Spend summary references a non-existent customer ${summary.customerId}`,
        { entity: 'customer', entityId: summary.customerId },
      );
    }

    return {
      customerId: summary.customerId,
      name: customer.name,
      email: customer.email,
      totalSpend: summary.totalSpend,
      lastCompletedOrderAt: summary.lastCompletedOrderAt,
    };
  });
}
