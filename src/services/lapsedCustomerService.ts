import type { RecordSource } from '../db/recordSource.js';
import { findHighValueLapsedCustomers } from '../segmentation/pipeline.js';
import { parseReferenceDate, validateRecencyWindow } from '../segmentation/lapsedFilter.js';
import {
  DEFAULT_RECENCY_WINDOW,
  type HighValueLapsedRecord,
  type RecencyWindow,
} from '../segmentation/types.js';
import { logger } from '../utils/logger.js';

export interface LapsedCustomerServiceDeps {
  recordSource: RecordSource;
  defaultRecencyWindow?: RecencyWindow;
  now?: () => Date;
}

export interface GenerateReportInput {
  referenceDate?: string;
  recencyMonths?: number;
  recencyDays?: number;
}

export interface LapsedCustomerRow {
  customerId: string;
  name: string;
  email: string;
  totalSpend: number;
  lastCompletedOrderAt: string;
}

export interface HighValueLapsedReport {
  referenceDate: string;
  cutoff: string;
  recencyWindow: RecencyWindow;
  stats: {
    qualifyingCustomers: number;
    topDecileSize: number;
    lapsedCustomers: number;
  };
  customers: LapsedCustomerRow[];
}

function toRow(record: HighValueLapsedRecord): LapsedCustomerRow {
  return {
    customerId: record.customerId,
    name: record.name,
    email: record.email,
    totalSpend: Math.round(record.totalSpend * 100) / 100,
    lastCompletedOrderAt: record.lastCompletedOrderAt.toISOString(),
  };
}

/**
 * An explicit months or days value replaces the whole default window; the
 * other component is then zero.
 */
function resolveWindow(input: GenerateReportInput, fallback: RecencyWindow): RecencyWindow {
  if (input.recencyMonths === undefined && input.recencyDays === undefined) {
    return fallback;
  }
  return {
    months: input.recencyMonths ?? 0,
    days: input.recencyDays ?? 0,
  };
}

export function createLapsedCustomerService(deps: LapsedCustomerServiceDeps) {
  const { recordSource } = deps;
  const defaultWindow = deps.defaultRecencyWindow ?? DEFAULT_RECENCY_WINDOW;
  const now = deps.now ?? (() => new Date());

  async function generateReport(input: GenerateReportInput = {}): Promise<HighValueLapsedReport> {
    const referenceDate =
      input.referenceDate === undefined ? now() : parseReferenceDate(input.referenceDate);
    const recencyWindow = resolveWindow(input, defaultWindow);
    validateRecencyWindow(recencyWindow);

    const startTime = Date.now();
    logger.info(
      { referenceDate: referenceDate.toISOString(), recencyWindow },
      'High-value lapsed segmentation: start',
    );

    const { rows, customers } = await recordSource.readSnapshot();

    const { records, stats } = findHighValueLapsedCustomers({
      rows,
      customers,
      referenceDate,
      recencyWindow,
    });

    if (stats.qualifyingCustomers === 0) {
      logger.info('High-value lapsed segmentation: no customers with completed orders');
    }

    logger.info(
      {
        lineItems: rows.length,
        qualifyingCustomers: stats.qualifyingCustomers,
        topDecileSize: stats.topDecileSize,
        lapsedCustomers: stats.lapsedCustomers,
        cutoff: stats.cutoff.toISOString(),
        durationMs: Date.now() - startTime,
      },
      'High-value lapsed segmentation: complete',
    );

    return {
      referenceDate: referenceDate.toISOString(),
      cutoff: stats.cutoff.toISOString(),
      recencyWindow,
      stats: {
        qualifyingCustomers: stats.qualifyingCustomers,
        topDecileSize: stats.topDecileSize,
        lapsedCustomers: stats.lapsedCustomers,
      },
      customers: records.map(toRow),
    };
  }

  return {
    generateReport,
  };
}

export type LapsedCustomerService = ReturnType<typeof createLapsedCustomerService>;
