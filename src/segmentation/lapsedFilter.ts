import { ConfigurationError } from '../utils/errors.js';
import type { CustomerSpendSummary, RecencyWindow } from './types.js';

const MS_PER_DAY = 24 * 60 * 60 * 1000;
const ISO_DATE_RE = /^\d{4}-\d{2}-\d{2}(T\d{2}:\d{2}:\d{2}(\.\d+)?Z?)?$/;

/**
 * Parse a reference date given as YYYY-MM-DD or YYYY-MM-DDTHH:mm:ss[.sss][Z].
 * Values without a zone designator are read as UTC.
 */
export function parseReferenceDate(value: string): Date {
  if (!ISO_DATE_RE.test(value)) {
    throw new ConfigurationError(
      `Invalid referenceDate "${value}": must be ISO 8601 format (YYYY-MM-DD or YYYY-MM-DDTHH:mm:ssZ)`,
    );
  }

  const normalized = value.length > 10 && !value.endsWith('Z') ? `${value}Z` : value;
  const parsed = new Date(normalized);

  // Rejects calendar dates that do not exist, e.g. 2026-02-30
  if (Number.isNaN(parsed.getTime()) || parsed.toISOString().slice(0, 10) !== value.slice(0, 10)) {
    throw new ConfigurationError(`Invalid referenceDate "${value}": not a calendar date`);
  }

  return parsed;
}

export function validateRecencyWindow(window: RecencyWindow): void {
  const { months, days } = window;
  if (!Number.isInteger(months) || !Number.isInteger(days)) {
    throw new ConfigurationError(
      `Invalid recency window (${months} months, ${days} days): values must be integers`,
    );
  }
  if (months < 0 || days < 0) {
    throw new ConfigurationError(
      `Invalid recency window (${months} months, ${days} days): values must not be negative`,
    );
  }
  if (months === 0 && days === 0) {
    throw new ConfigurationError('Invalid recency window: duration must be greater than zero');
  }
}

function subtractMonths(date: Date, months: number): Date {
  const totalMonths = date.getUTCFullYear() * 12 + date.getUTCMonth() - months;
  const year = Math.floor(totalMonths / 12);
  const month = totalMonths - year * 12;
  const lastDayOfMonth = new Date(Date.UTC(year, month + 1, 0)).getUTCDate();

  return new Date(
    Date.UTC(
      year,
      month,
      Math.min(date.getUTCDate(), lastDayOfMonth),
      date.getUTCHours(),
      date.getUTCMinutes(),
      date.getUTCSeconds(),
      date.getUTCMilliseconds(),
    ),
  );
}

/**
 * referenceDate minus the window. Months are calendar months in UTC with the
 * day clamped to the end of the target month (2026-08-31 minus 6 months is
 * 2026-02-28); days are whole 24h periods.
 */
export function computeCutoff(referenceDate: Date, window: RecencyWindow): Date {
  if (Number.isNaN(referenceDate.getTime())) {
    throw new ConfigurationError('Invalid referenceDate: not a valid timestamp');
  }
  validateRecencyWindow(window);

  const afterMonths = subtractMonths(referenceDate, window.months);
  return new Date(afterMonths.getTime() - window.days * MS_PER_DAY);
}

/**
 * Keep summaries whose last completed order is at or before the cutoff.
 * Input order is preserved.
 */
export function filterLapsed(
  ranked: readonly CustomerSpendSummary[],
  referenceDate: Date,
  window: RecencyWindow,
): CustomerSpendSummary[] {
  const cutoffMs = computeCutoff(referenceDate, window).getTime();
  return ranked.filter((summary) => summary.lastCompletedOrderAt.getTime() <= cutoffMs);
}
