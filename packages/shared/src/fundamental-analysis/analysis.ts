import { DEFAULT_ALIAS_TABLE } from './aliases';
import { normalize } from './normalizer';
import { computeRatios, RATIO_DEFINITIONS, requiredFields } from './ratios';
import { normalizeStatements } from './statements';
import type {
  AnalysisDiagnostic,
  AnalyzeOptions,
  CanonicalPeriod,
  FinancialAnalysis,
  RatioResult,
  RawStatementRecord,
  StatementSet,
} from './types';
import { CANONICAL_FIELDS, RATIO_NAMES } from './types';

/**
 * Explain ratios that could not be computed for any period, and fields
 * whose source values were present but not numeric.
 */
export function diagnoseAnalysis(periods: readonly CanonicalPeriod[], results: readonly RatioResult[]): AnalysisDiagnostic[] {
  if (results.length === 0) {
    return [];
  }

  const diagnostics: AnalysisDiagnostic[] = [];

  for (const ratio of RATIO_NAMES) {
    if (!results.every((result) => result.ratios[ratio].status === 'undefined')) {
      continue;
    }
    const missingFields = requiredFields(RATIO_DEFINITIONS[ratio]).filter((field) =>
      periods.every((period) => period.fields[field].status !== 'present')
    );
    const message =
      missingFields.length > 0
        ? `${ratio} could not be calculated: ${missingFields.join(' and ')} not found in any period`
        : `${ratio} could not be calculated for any period: inputs are missing, the denominator is zero or the result overflows`;
    diagnostics.push({ kind: 'ratio_unavailable', ratio, missingFields, message });
  }

  for (const field of CANONICAL_FIELDS) {
    const periodIds = periods.filter((period) => period.fields[field].status === 'invalid').map((p) => p.periodId);
    if (periodIds.length > 0) {
      diagnostics.push({
        kind: 'invalid_values',
        field,
        periodIds,
        message: `${field} has non-numeric values in ${periodIds.join(', ')}`,
      });
    }
  }

  return diagnostics;
}

function isRecordList(input: readonly RawStatementRecord[] | StatementSet): input is readonly RawStatementRecord[] {
  return Array.isArray(input);
}

/**
 * Run the full pipeline: normalize → merge → compute ratios and trends → diagnose.
 *
 * `input` is either records already merged by period, or one source per statement type.
 */
export function analyzeStatements(
  input: readonly RawStatementRecord[] | StatementSet,
  options: AnalyzeOptions = {}
): FinancialAnalysis {
  const { aliasTable = DEFAULT_ALIAS_TABLE, ...normalizeOptions } = options;

  const periods = isRecordList(input)
    ? normalize(input, aliasTable, normalizeOptions)
    : normalizeStatements(input, aliasTable, normalizeOptions);
  const { results, trends } = computeRatios(periods);

  return {
    periods,
    results,
    trends,
    diagnostics: diagnoseAnalysis(periods, results),
  };
}
