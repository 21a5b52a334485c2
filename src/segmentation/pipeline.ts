/**
 * High-value lapsed customer segmentation.
 *
 * Flow: aggregate completed spend → keep the top ceil(N/10) by spend →
 * keep those whose last completed order is at or before the cutoff →
 * attach name and email.
 *
 * Pure and synchronous: the caller materializes every record first, and any
 * integrity or configuration error aborts the run without a partial result.
 */

import { aggregateSpend } from './spendAggregator.js';
import { selectTopDecile } from './valueRanker.js';
import { computeCutoff, filterLapsed } from './lapsedFilter.js';
import { assembleResults } from './resultAssembler.js';
import type { SegmentationInput, SegmentationResult } from './types.js';

export function findHighValueLapsedCustomers(input: SegmentationInput): SegmentationResult {
  const { rows, customers, referenceDate, recencyWindow } = input;

  // Validate configuration before touching the data
  const cutoff = computeCutoff(referenceDate, recencyWindow);

  const summaries = aggregateSpend(rows, customers);
  const topDecile = selectTopDecile(summaries);
  const lapsed = filterLapsed(topDecile, referenceDate, recencyWindow);
  const records = assembleResults(lapsed, customers);

  return {
    records,
    stats: {
      qualifyingCustomers: summaries.length,
      topDecileSize: topDecile.length,
      lapsedCustomers: records.length,
      cutoff,
    },
  };
}
