/**
 * Statement Normalizer
 *
 * Maps raw, inconsistently labelled statement records onto the canonical
 * field schema, one CanonicalPeriod per fiscal period, oldest first.
 */

import { getConfig } from '../config';
import { AmbiguousPeriodError } from '../errors';
import { logger } from '../utils/logger';
import { parseAliasTable } from './aliases';
import { normalizePeriodId } from './period';
import type {
  AliasMatchMode,
  AliasTable,
  CanonicalFields,
  CanonicalPeriod,
  FieldValue,
  NormalizeOptions,
  RawStatementRecord,
} from './types';
import { CANONICAL_FIELDS } from './types';
import { comparePeriodIds, createEmptyFields, normalizeLabel, parseFieldValue } from './utils';

const log = logger.child({ component: 'normalizer' });

interface LabelEntry {
  label: string;
  raw: unknown;
}

/**
 * Index a record's labels by their normalized form.
 * When two labels collapse to the same key, the first one in the record wins.
 */
function indexLabels(values: Record<string, unknown>): Map<string, LabelEntry> {
  const index = new Map<string, LabelEntry>();
  for (const [label, raw] of Object.entries(values)) {
    const key = normalizeLabel(label);
    if (!index.has(key)) {
      index.set(key, { label, raw });
    }
  }
  return index;
}

function findExact(index: Map<string, LabelEntry>, aliases: readonly string[]): LabelEntry | undefined {
  for (const alias of aliases) {
    const entry = index.get(normalizeLabel(alias));
    if (entry) return entry;
  }
  return undefined;
}

/**
 * A label contained in an alias only counts when it is made of whole words
 * of the alias and carries at least one letter or digit.
 */
function isWordsOf(key: string, aliasKey: string): boolean {
  return /[\p{L}\p{N}]/u.test(key) && ` ${aliasKey} `.includes(` ${key} `);
}

function findContaining(index: Map<string, LabelEntry>, aliases: readonly string[]): LabelEntry | undefined {
  for (const alias of aliases) {
    const aliasKey = normalizeLabel(alias);
    for (const [key, entry] of index) {
      if (key === '') continue;
      if (key.includes(aliasKey) || isWordsOf(key, aliasKey)) {
        return entry;
      }
    }
  }
  return undefined;
}

/**
 * Resolve one canonical field from a record's label index
 */
function resolveField(
  index: Map<string, LabelEntry>,
  aliases: readonly string[] | undefined,
  matchMode: AliasMatchMode
): FieldValue {
  if (!aliases || aliases.length === 0) {
    return { status: 'absent' };
  }

  const entry = findExact(index, aliases) ?? (matchMode === 'contains' ? findContaining(index, aliases) : undefined);
  if (!entry) {
    return { status: 'absent' };
  }
  return parseFieldValue(entry.label, entry.raw);
}

function resolveFields(values: Record<string, unknown>, table: AliasTable, matchMode: AliasMatchMode): CanonicalFields {
  const index = indexLabels(values);
  const fields = createEmptyFields();
  for (const field of CANONICAL_FIELDS) {
    fields[field] = resolveField(index, table[field], matchMode);
  }
  return fields;
}

/**
 * Reject records that share a period identifier.
 * Reports the first duplicated period with every record index carrying it.
 */
function assertUniquePeriods(periodIds: readonly string[]): void {
  const positions = new Map<string, number[]>();
  for (const [index, periodId] of periodIds.entries()) {
    const seen = positions.get(periodId);
    if (seen) {
      seen.push(index);
    } else {
      positions.set(periodId, [index]);
    }
  }

  for (const [periodId, indexes] of positions) {
    if (indexes.length > 1) {
      throw new AmbiguousPeriodError(periodId, indexes);
    }
  }
}

/**
 * Normalize raw statement records into canonical periods.
 *
 * - Every canonical field is resolved through the alias table, first matching alias wins
 * - Unmatched fields are `absent`, unparseable values are `invalid`; neither becomes zero
 * - Output is sorted ascending by period identifier
 *
 * @throws AmbiguousPeriodError when two records share a period identifier
 * @throws InvalidPeriodError when a period identifier is empty or not a date
 * @throws AliasTableError when the alias table does not validate
 */
export function normalize(
  rawRecords: readonly RawStatementRecord[],
  aliasTable: AliasTable,
  options: NormalizeOptions = {}
): CanonicalPeriod[] {
  if (rawRecords.length === 0) {
    return [];
  }

  const table = parseAliasTable(aliasTable);
  const matchMode = options.matchMode ?? getConfig().normalizer.matchMode;

  const keyed = rawRecords.map((record) => ({ periodId: normalizePeriodId(record.period), record }));
  assertUniquePeriods(keyed.map(({ periodId }) => periodId));

  const periods: CanonicalPeriod[] = keyed.map(({ periodId, record }) => ({
    periodId,
    fields: resolveFields(record.values, table, matchMode),
  }));
  periods.sort((a, b) => comparePeriodIds(a.periodId, b.periodId));

  log.debug('Normalized statement records', {
    periods: periods.length,
    matchMode,
    first: periods[0]?.periodId,
    last: periods[periods.length - 1]?.periodId,
  });

  return periods;
}
