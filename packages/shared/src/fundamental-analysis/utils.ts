/**
 * Financial Data Utilities
 *
 * Value parsing and label normalization shared by the normalizer,
 * the period merger and the ratio engine.
 */

import type { CanonicalField, CanonicalFields, FieldValue } from './types';
import { CANONICAL_FIELDS } from './types';

const DECIMAL_NUMBER = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

/**
 * Safely convert a value to number or null.
 * Providers send large numbers as strings and gaps as empty strings;
 * only plain decimal strings are read as numbers.
 */
export function toNumberOrNull(value: unknown): number | null {
  if (value === null || value === undefined || value === '') return null;
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (!DECIMAL_NUMBER.test(trimmed)) return null;
    const parsed = Number(trimmed);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

/**
 * Check if a raw value means "no data" rather than "bad data"
 */
export function isBlankValue(value: unknown): boolean {
  return value === null || value === undefined || (typeof value === 'string' && value.trim() === '');
}

/**
 * Resolve a raw cell into a field value.
 * Sentinels such as "N/A" or NaN become `invalid`, never zero.
 */
export function parseFieldValue(label: string, raw: unknown): FieldValue {
  if (isBlankValue(raw)) {
    return { status: 'absent' };
  }
  const value = toNumberOrNull(raw);
  if (value === null) {
    return { status: 'invalid', label, raw };
  }
  return { status: 'present', value };
}

/**
 * Case-insensitive, whitespace-normalized form of a line-item label
 */
export function normalizeLabel(label: string): string {
  return label.trim().replace(/\s+/g, ' ').toLowerCase();
}

/**
 * Field schema with every canonical field marked absent
 */
export function createEmptyFields(): CanonicalFields {
  return {
    totalAssets: { status: 'absent' },
    totalLiabilities: { status: 'absent' },
    netIncome: { status: 'absent' },
    revenue: { status: 'absent' },
    currentAssets: { status: 'absent' },
    currentLiabilities: { status: 'absent' },
    shareholdersEquity: { status: 'absent' },
    inventory: { status: 'absent' },
    operatingCashFlow: { status: 'absent' },
  };
}

export function isCanonicalField(name: string): name is CanonicalField {
  return CANONICAL_FIELDS.some((field) => field === name);
}

/**
 * Ordering key comparison for period identifiers (ISO dates sort chronologically)
 */
export function comparePeriodIds(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
