/**
 * Ratio Report
 * Display rows, CSV text and value formatting for a FinancialAnalysis.
 * Rounding happens here and nowhere in the engine.
 */

import { type DisplayConfig, getConfig } from '../config';
import { RATIO_DEFINITIONS } from './ratios';
import type { FinancialAnalysis, RatioName, RatioValue, TrendAnnotation } from './types';
import { RATIO_NAMES } from './types';

/** Placeholder shown for undefined ratios and trends */
export const UNDEFINED_DISPLAY = '—';

export interface RatioRow {
  period: string;
  values: Record<RatioName, number | null>;
}

export function ratioValueOrNull(value: RatioValue): number | null {
  return value.status === 'defined' ? value.value : null;
}

/**
 * One row per period, one column per ratio; undefined ratios become null
 */
export function toRatioRows(analysis: Pick<FinancialAnalysis, 'results'>): RatioRow[] {
  return analysis.results.map((result) => ({
    period: result.periodId,
    values: {
      ROA: ratioValueOrNull(result.ratios.ROA),
      ROE: ratioValueOrNull(result.ratios.ROE),
      'Current Ratio': ratioValueOrNull(result.ratios['Current Ratio']),
    },
  }));
}

function escapeCSV(value: unknown): string {
  if (value === null || value === undefined) return '';
  const str = String(value);
  if (str.includes(',') || str.includes('"') || str.includes('\n')) {
    return `"${str.replace(/"/g, '""')}"`;
  }
  return str;
}

/**
 * CSV with a Period column and one column per ratio.
 * Undefined ratios are empty cells; numbers keep full precision.
 */
export function toRatioCsv(analysis: Pick<FinancialAnalysis, 'results'>): string {
  const header = ['Period', ...RATIO_NAMES];
  const rows = toRatioRows(analysis).map((row) => [row.period, ...RATIO_NAMES.map((name) => row.values[name])]);

  return [header, ...rows].map((cells) => cells.map((cell) => escapeCSV(cell)).join(',')).join('\n');
}

/**
 * Format a ratio for display: ROA and ROE as percentages, Current Ratio as a multiple
 */
export function formatRatioValue(
  ratio: RatioName,
  value: RatioValue | number | null,
  display: DisplayConfig = getConfig().display
): string {
  const numeric = typeof value === 'number' || value === null ? value : ratioValueOrNull(value);
  if (numeric === null) {
    return UNDEFINED_DISPLAY;
  }

  if (RATIO_DEFINITIONS[ratio].display === 'percent') {
    return `${(numeric * 100).toFixed(display.percentDecimals)}%`;
  }
  return numeric.toFixed(display.multipleDecimals);
}

function signed(text: string, value: number): string {
  return value > 0 ? `+${text}` : text;
}

/**
 * Format a trend annotation, e.g. "+2.50pp (+25.00%)" for ROA or "-0.40 (-20.00%)" for Current Ratio.
 * Deltas of percentage ratios are shown in percentage points.
 */
export function formatTrend(annotation: TrendAnnotation, display: DisplayConfig = getConfig().display): string {
  if (annotation.delta === null) {
    return UNDEFINED_DISPLAY;
  }

  const { delta, percentChange } = annotation;
  const deltaText =
    RATIO_DEFINITIONS[annotation.ratio].display === 'percent'
      ? `${signed((delta * 100).toFixed(display.percentDecimals), delta)}pp`
      : signed(delta.toFixed(display.multipleDecimals), delta);

  if (percentChange === null) {
    return deltaText;
  }
  return `${deltaText} (${signed((percentChange * 100).toFixed(display.percentDecimals), percentChange)}%)`;
}
