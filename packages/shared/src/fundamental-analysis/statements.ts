/**
 * Statement inputs: frame conversion and per-statement-type normalization
 */

import { mergePeriodSeries } from './merge';
import { normalize } from './normalizer';
import type {
  AliasTable,
  CanonicalPeriod,
  NormalizeOptions,
  RawStatementRecord,
  StatementFrame,
  StatementSet,
  StatementSource,
  StatementType,
} from './types';

const STATEMENT_TYPES: readonly StatementType[] = ['income', 'balance', 'cashflow'];

/**
 * Convert a column-oriented frame (labels × periods) into one record per period.
 * A row shorter than the period list leaves its label out of the trailing records.
 */
export function frameToRecords(frame: StatementFrame): RawStatementRecord[] {
  const rows = Object.entries(frame.rows);

  return frame.periods.map((period, column) => {
    const values: Record<string, unknown> = {};
    for (const [label, cells] of rows) {
      if (column < cells.length) {
        values[label] = cells[column];
      }
    }
    return { period, values };
  });
}

export function isStatementFrame(source: StatementSource): source is StatementFrame {
  return !Array.isArray(source);
}

export function toRecords(source: StatementSource): RawStatementRecord[] {
  return isStatementFrame(source) ? frameToRecords(source) : source;
}

/**
 * Normalize each statement type on its own, then merge the series by period.
 * Duplicate periods within one statement type raise AmbiguousPeriodError;
 * the same period across statement types is expected and merged.
 */
export function normalizeStatements(
  statements: StatementSet,
  aliasTable: AliasTable,
  options: NormalizeOptions = {}
): CanonicalPeriod[] {
  const series: CanonicalPeriod[][] = [];

  for (const type of STATEMENT_TYPES) {
    const source = statements[type];
    if (source) {
      series.push(normalize(toRecords(source), aliasTable, options));
    }
  }

  return mergePeriodSeries(...series);
}
