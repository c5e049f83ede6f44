/**
 * Date utility functions for type-safe date-to-string conversion
 */

const ISO_DATE_PREFIX = /^(\d{4}-\d{2}-\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.\d+)?)?(Z|[+-]\d{2}:?\d{2})?)?$/;

/**
 * Convert a Date to ISO date string (YYYY-MM-DD format, UTC)
 *
 * @throws Error if the date is invalid
 *
 * @example
 * ```typescript
 * const dateStr = toISODateString(new Date('2024-01-15'));
 * console.log(dateStr); // "2024-01-15"
 * ```
 */
export function toISODateString(date: Date): string {
  if (Number.isNaN(date.getTime())) {
    throw new Error('Invalid date: Date object represents an invalid date');
  }

  const isoString = date.toISOString();
  const parts = isoString.split('T');

  if (!parts[0]) {
    throw new Error(`Invalid date: failed to extract date string from ISO string "${isoString}"`);
  }

  return parts[0];
}

/**
 * Extract the YYYY-MM-DD part of a date or date-time string.
 * Returns null when the string does not start with an ISO calendar date.
 *
 * @example
 * ```typescript
 * extractISODate('2023-09-30 00:00:00'); // "2023-09-30"
 * extractISODate('FY2023'); // null
 * ```
 */
export function extractISODate(value: string): string | null {
  const match = ISO_DATE_PREFIX.exec(value);
  return match?.[1] ?? null;
}

/**
 * Check that a YYYY-MM-DD string names a real calendar day
 */
export function isValidISODate(value: string): boolean {
  const parsed = new Date(`${value}T00:00:00.000Z`);
  return !Number.isNaN(parsed.getTime()) && toISODateString(parsed) === value;
}

function offsetMinutes(zone: string): number {
  if (zone === 'Z') return 0;
  const digits = zone.slice(1).replace(':', '');
  const minutes = Number(digits.slice(0, 2)) * 60 + Number(digits.slice(2));
  return zone.startsWith('-') ? -minutes : minutes;
}

/**
 * UTC calendar day of a date-time string that carries an explicit offset.
 * Returns null for strings without an offset; their written date stands.
 *
 * @example
 * ```typescript
 * utcDateOfOffsetDateTime('2023-12-31T23:00:00-05:00'); // "2024-01-01"
 * utcDateOfOffsetDateTime('2023-12-31 23:00:00'); // null
 * ```
 */
export function utcDateOfOffsetDateTime(value: string): string | null {
  const match = ISO_DATE_PREFIX.exec(value);
  const date = match?.[1];
  const hours = match?.[2];
  const minutes = match?.[3];
  const zone = match?.[5];
  if (!date || !hours || !minutes || !zone) {
    return null;
  }

  const seconds = Number(match?.[4] ?? '0');
  const midnight = Date.parse(`${date}T00:00:00.000Z`);
  const elapsed = (Number(hours) * 60 + Number(minutes) - offsetMinutes(zone)) * 60_000 + seconds * 1000;
  return toISODateString(new Date(midnight + elapsed));
}
