/**
 * Period Merger
 *
 * Combines canonical series normalized from different statement types
 * (income statement, balance sheet, cash flow) into one series keyed by period.
 */

import { ConflictingFieldError } from '../errors';
import { logger } from '../utils/logger';
import { assertCanonicalSeries } from './period';
import type { CanonicalField, CanonicalFields, CanonicalPeriod, FieldValue } from './types';
import { CANONICAL_FIELDS } from './types';
import { comparePeriodIds } from './utils';

/**
 * Pick the more informative of two values for the same field and period.
 * present > invalid > absent; two different present values conflict.
 */
function mergeFieldValue(periodId: string, field: CanonicalField, current: FieldValue, next: FieldValue): FieldValue {
  if (current.status === 'present' && next.status === 'present') {
    if (current.value !== next.value) {
      throw new ConflictingFieldError(periodId, field, [current.value, next.value]);
    }
    return current;
  }
  if (current.status === 'present') return current;
  if (next.status === 'present') return next;
  if (current.status === 'invalid') return current;
  return next;
}

function mergeFields(periodId: string, current: CanonicalFields, next: CanonicalFields): CanonicalFields {
  const merged: CanonicalFields = { ...current };
  for (const field of CANONICAL_FIELDS) {
    merged[field] = mergeFieldValue(periodId, field, current[field], next[field]);
  }
  return merged;
}

/**
 * Merge canonical series by period identifier.
 *
 * @throws InvariantViolationError when an input series is unsorted or has duplicates
 * @throws ConflictingFieldError when two series disagree on a present value
 */
export function mergePeriodSeries(...series: ReadonlyArray<readonly CanonicalPeriod[]>): CanonicalPeriod[] {
  const byPeriod = new Map<string, CanonicalFields>();

  for (const [index, periods] of series.entries()) {
    assertCanonicalSeries(periods, `statement series ${index}`);
    for (const period of periods) {
      const current = byPeriod.get(period.periodId);
      byPeriod.set(period.periodId, current ? mergeFields(period.periodId, current, period.fields) : { ...period.fields });
    }
  }

  const merged = [...byPeriod.entries()]
    .map(([periodId, fields]) => ({ periodId, fields }))
    .sort((a, b) => comparePeriodIds(a.periodId, b.periodId));

  logger.trace('Merged statement series', { component: 'merge', series: series.length, periods: merged.length });

  return merged;
}
