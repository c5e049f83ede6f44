/**
 * Fiscal period identifiers and the canonical series invariant
 */

import { InvalidPeriodError, InvariantViolationError } from '../errors';
import { extractISODate, isValidISODate, toISODateString, utcDateOfOffsetDateTime } from '../utils/date-helpers';
import type { CanonicalPeriod } from './types';
import { CANONICAL_FIELDS } from './types';
import { comparePeriodIds } from './utils';

/**
 * Normalize a period identifier into its ordering key.
 *
 * Dates and date-time strings become YYYY-MM-DD; other labels ("2023", "2023-Q4")
 * are kept as trimmed strings. An instant (a Date, or a date-time string with Z or
 * an offset) takes its UTC calendar day; a date-time without an offset keeps its
 * written date.
 */
export function normalizePeriodId(period: unknown): string {
  if (period instanceof Date) {
    if (Number.isNaN(period.getTime())) {
      throw new InvalidPeriodError('Period date is invalid', period);
    }
    return toISODateString(period);
  }

  if (typeof period === 'number' && Number.isInteger(period)) {
    return String(period);
  }

  if (typeof period !== 'string') {
    throw new InvalidPeriodError(`Period identifier must be a string or a Date, got ${typeof period}`, period);
  }

  const trimmed = period.trim();
  if (trimmed === '') {
    throw new InvalidPeriodError('Period identifier is empty', period);
  }

  const isoDate = extractISODate(trimmed);
  if (isoDate === null) {
    return trimmed;
  }
  if (!isValidISODate(isoDate)) {
    throw new InvalidPeriodError(`Period date "${trimmed}" is not a calendar date`, period);
  }
  return utcDateOfOffsetDateTime(trimmed) ?? isoDate;
}

/**
 * Verify that a canonical series is strictly ascending, free of duplicates
 * and carries the full canonical field schema in every period.
 *
 * @throws InvariantViolationError naming the first offending period
 */
export function assertCanonicalSeries(periods: readonly CanonicalPeriod[], source = 'canonical series'): void {
  let previous: string | undefined;

  for (const period of periods) {
    const missing = CANONICAL_FIELDS.filter((field) => !(field in period.fields));
    const extra = Object.keys(period.fields).filter((key) => !CANONICAL_FIELDS.some((field) => field === key));
    if (missing.length > 0 || extra.length > 0) {
      const detail = [
        missing.length > 0 ? `missing ${missing.join(', ')}` : '',
        extra.length > 0 ? `unexpected ${extra.join(', ')}` : '',
      ]
        .filter(Boolean)
        .join('; ');
      throw new InvariantViolationError(
        `${source}: period ${period.periodId} does not match the canonical field schema (${detail})`,
        period.periodId
      );
    }

    if (previous !== undefined) {
      const order = comparePeriodIds(previous, period.periodId);
      if (order === 0) {
        throw new InvariantViolationError(`${source}: duplicate period ${period.periodId}`, period.periodId);
      }
      if (order > 0) {
        throw new InvariantViolationError(
          `${source}: period ${period.periodId} follows ${previous}; periods must be in ascending order`,
          period.periodId
        );
      }
    }
    previous = period.periodId;
  }
}
