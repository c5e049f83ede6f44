/**
 * Ratio Engine
 *
 * Computes ROA, ROE and Current Ratio per canonical period plus
 * period-over-period trends. Missing inputs and zero denominators yield
 * explicit undefined values; only broken series invariants throw.
 */

import { logger } from '../utils/logger';
import { assertCanonicalSeries } from './period';
import type {
  CanonicalField,
  CanonicalPeriod,
  RatioComputation,
  RatioDefinition,
  RatioName,
  RatioResult,
  RatioValue,
  TrendAnnotation,
  TrendSeries,
} from './types';
import { RATIO_NAMES } from './types';

const log = logger.child({ component: 'ratio-engine' });

/**
 * Closed set of ratios computed per period
 */
export const RATIO_DEFINITIONS: Readonly<Record<RatioName, RatioDefinition>> = {
  ROA: { name: 'ROA', numerator: 'netIncome', denominator: 'totalAssets', display: 'percent' },
  ROE: { name: 'ROE', numerator: 'netIncome', denominator: 'shareholdersEquity', display: 'percent' },
  'Current Ratio': {
    name: 'Current Ratio',
    numerator: 'currentAssets',
    denominator: 'currentLiabilities',
    display: 'multiple',
  },
};

/**
 * Required input fields of a ratio, numerator first
 */
export function requiredFields(definition: RatioDefinition): CanonicalField[] {
  return [definition.numerator, definition.denominator];
}

/**
 * Compute one ratio for one period.
 *
 * Negative denominators (negative equity) still produce a value;
 * an exact zero denominator or a quotient overflowing to ±Infinity is undefined.
 */
export function computeRatio(period: CanonicalPeriod, definition: RatioDefinition): RatioValue {
  const numerator = period.fields[definition.numerator];
  const denominator = period.fields[definition.denominator];

  const missingFields = requiredFields(definition).filter((field) => period.fields[field].status !== 'present');
  if (numerator.status !== 'present' || denominator.status !== 'present') {
    return { status: 'undefined', reason: 'missing_input', missingFields };
  }

  if (denominator.value === 0) {
    return { status: 'undefined', reason: 'zero_denominator', missingFields: [] };
  }

  const value = numerator.value / denominator.value;
  if (!Number.isFinite(value)) {
    return { status: 'undefined', reason: 'non_finite', missingFields: [] };
  }
  return { status: 'defined', value };
}

function computePeriodRatios(period: CanonicalPeriod): RatioResult {
  return {
    periodId: period.periodId,
    ratios: {
      ROA: computeRatio(period, RATIO_DEFINITIONS.ROA),
      ROE: computeRatio(period, RATIO_DEFINITIONS.ROE),
      'Current Ratio': computeRatio(period, RATIO_DEFINITIONS['Current Ratio']),
    },
  };
}

/**
 * Change between two values of the same ratio.
 * percentChange is relative to the magnitude of the prior value.
 */
export function computeTrend(ratio: RatioName, previous: RatioResult, current: RatioResult): TrendAnnotation {
  const before = previous.ratios[ratio];
  const after = current.ratios[ratio];
  const base = { ratio, fromPeriodId: previous.periodId, toPeriodId: current.periodId };

  if (before.status !== 'defined' || after.status !== 'defined') {
    return { ...base, delta: null, percentChange: null };
  }

  const delta = after.value - before.value;
  if (!Number.isFinite(delta)) {
    return { ...base, delta: null, percentChange: null };
  }
  const percentChange = before.value === 0 ? null : delta / Math.abs(before.value);
  return {
    ...base,
    delta,
    percentChange: percentChange !== null && Number.isFinite(percentChange) ? percentChange : null,
  };
}

/**
 * Trend annotations for every ratio across adjacent periods.
 * The first period has no entry, so each series holds results.length - 1 items.
 */
export function computeTrends(results: readonly RatioResult[]): TrendSeries {
  const trends: TrendSeries = { ROA: [], ROE: [], 'Current Ratio': [] };

  for (let i = 1; i < results.length; i++) {
    const previous = results[i - 1];
    const current = results[i];
    if (!previous || !current) continue;

    for (const ratio of RATIO_NAMES) {
      trends[ratio].push(computeTrend(ratio, previous, current));
    }
  }

  return trends;
}

/**
 * Compute ratio values and trends for a canonical series (oldest first).
 *
 * @throws InvariantViolationError when periods are unsorted, duplicated or off-schema
 */
export function computeRatios(periods: readonly CanonicalPeriod[]): RatioComputation {
  assertCanonicalSeries(periods, 'ratio engine input');

  const results = periods.map(computePeriodRatios);
  const trends = computeTrends(results);

  log.debug('Computed ratios', {
    periods: results.length,
    undefinedValues: results.reduce(
      (count, result) => count + RATIO_NAMES.filter((name) => result.ratios[name].status === 'undefined').length,
      0
    ),
  });

  return { results, trends };
}
