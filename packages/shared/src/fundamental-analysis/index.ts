// Fundamental Analysis Module
// Statement normalization, ratio computation (ROA, ROE, Current Ratio) and trend reporting

export { DEFAULT_ALIAS_TABLE, AliasTableSchema, identityAliasTable, parseAliasTable } from './aliases';
export { analyzeStatements, diagnoseAnalysis } from './analysis';
export { mergePeriodSeries } from './merge';
export { normalize } from './normalizer';
export { assertCanonicalSeries, normalizePeriodId } from './period';
export { computeRatio, computeRatios, computeTrend, computeTrends, RATIO_DEFINITIONS, requiredFields } from './ratios';
export type { RatioRow } from './report';
export {
  formatRatioValue,
  formatTrend,
  ratioValueOrNull,
  toRatioCsv,
  toRatioRows,
  UNDEFINED_DISPLAY,
} from './report';
export { frameToRecords, isStatementFrame, normalizeStatements, toRecords } from './statements';
export type {
  AliasMatchMode,
  AliasTable,
  AnalysisDiagnostic,
  AnalyzeOptions,
  CanonicalField,
  CanonicalFields,
  CanonicalPeriod,
  FieldValue,
  FinancialAnalysis,
  InvalidFieldDiagnostic,
  NormalizeOptions,
  RatioComputation,
  RatioDefinition,
  RatioDiagnostic,
  RatioName,
  RatioResult,
  RatioValue,
  RawStatementRecord,
  StatementFrame,
  StatementSet,
  StatementSource,
  StatementType,
  TrendAnnotation,
  TrendSeries,
  UndefinedRatioReason,
} from './types';
export { CANONICAL_FIELDS, RATIO_NAMES } from './types';
export {
  comparePeriodIds,
  createEmptyFields,
  isBlankValue,
  isCanonicalField,
  normalizeLabel,
  parseFieldValue,
  toNumberOrNull,
} from './utils';
