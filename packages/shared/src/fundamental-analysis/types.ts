import type { AliasMatchMode } from '../config';

export type { AliasMatchMode } from '../config';

/**
 * Canonical statement line items, independent of any data provider's labels
 */
export const CANONICAL_FIELDS = [
  'totalAssets',
  'totalLiabilities',
  'netIncome',
  'revenue',
  'currentAssets',
  'currentLiabilities',
  'shareholdersEquity',
  'inventory',
  'operatingCashFlow',
] as const;

export type CanonicalField = (typeof CANONICAL_FIELDS)[number];

/**
 * One raw statement record as handed over by a data provider.
 * Labels are whatever the provider uses and may change between periods.
 */
export interface RawStatementRecord {
  /** Fiscal period end (ISO date, Date object, or a label such as "2023" / "2023-Q4") */
  period: string | Date;
  values: Record<string, unknown>;
}

/**
 * Column-oriented statement: every row is one line item, every column one period
 */
export interface StatementFrame {
  periods: Array<string | Date>;
  rows: Record<string, unknown[]>;
}

export type StatementSource = RawStatementRecord[] | StatementFrame;

/**
 * Statements for one company, one statement type per entry
 */
export interface StatementSet {
  income?: StatementSource;
  balance?: StatementSource;
  cashflow?: StatementSource;
}

export type StatementType = keyof StatementSet;

/**
 * Canonical field → accepted source labels, tried in order
 */
export type AliasTable = Partial<Record<CanonicalField, readonly string[]>>;

/**
 * Resolved value of one canonical field.
 * Zero is a present value; missing and unparseable values are kept apart from it.
 */
export type FieldValue =
  | { status: 'present'; value: number }
  | { status: 'invalid'; label: string; raw: unknown }
  | { status: 'absent' };

export type CanonicalFields = Record<CanonicalField, FieldValue>;

export interface CanonicalPeriod {
  periodId: string;
  fields: CanonicalFields;
}

export interface NormalizeOptions {
  /** Label matching mode (default: configured `normalizer.matchMode`) */
  matchMode?: AliasMatchMode;
}

export const RATIO_NAMES = ['ROA', 'ROE', 'Current Ratio'] as const;

export type RatioName = (typeof RATIO_NAMES)[number];

export type UndefinedRatioReason = 'missing_input' | 'zero_denominator' | 'non_finite';

export type RatioValue =
  | { status: 'defined'; value: number }
  | { status: 'undefined'; reason: UndefinedRatioReason; missingFields: CanonicalField[] };

export interface RatioDefinition {
  name: RatioName;
  numerator: CanonicalField;
  denominator: CanonicalField;
  /** How the presentation layer shows the value */
  display: 'percent' | 'multiple';
}

/**
 * Ratio values for one period
 */
export interface RatioResult {
  periodId: string;
  ratios: Record<RatioName, RatioValue>;
}

/**
 * Change of one ratio between two adjacent periods.
 * percentChange is a fraction: 0.25 means +25%.
 */
export interface TrendAnnotation {
  ratio: RatioName;
  fromPeriodId: string;
  toPeriodId: string;
  delta: number | null;
  percentChange: number | null;
}

export type TrendSeries = Record<RatioName, TrendAnnotation[]>;

export interface RatioComputation {
  results: RatioResult[];
  trends: TrendSeries;
}

export interface RatioDiagnostic {
  kind: 'ratio_unavailable';
  ratio: RatioName;
  /** Required fields never present in any period */
  missingFields: CanonicalField[];
  message: string;
}

export interface InvalidFieldDiagnostic {
  kind: 'invalid_values';
  field: CanonicalField;
  periodIds: string[];
  message: string;
}

export type AnalysisDiagnostic = RatioDiagnostic | InvalidFieldDiagnostic;

export interface FinancialAnalysis extends RatioComputation {
  periods: CanonicalPeriod[];
  diagnostics: AnalysisDiagnostic[];
}

export interface AnalyzeOptions extends NormalizeOptions {
  /** Alias table for label resolution (default: DEFAULT_ALIAS_TABLE) */
  aliasTable?: AliasTable;
}
