import { afterEach, describe, expect, it } from 'vitest';
import { resetConfig } from '../../config';
import { ConflictingFieldError } from '../../errors';
import { mockBalanceFrame, mockIncomeFrame, mockMergedRecords } from '../../test-utils/fixtures';
import { identityAliasTable } from '../aliases';
import { analyzeStatements } from '../analysis';

describe('analyzeStatements', () => {
  afterEach(() => {
    resetConfig();
  });

  it('computes ratios from records merged by period', () => {
    const analysis = analyzeStatements(mockMergedRecords);

    expect(analysis.periods.map((period) => period.periodId)).toEqual(['2022', '2023']);
    expect(analysis.results[1]?.ratios).toEqual({
      ROA: { status: 'defined', value: 0.125 },
      ROE: { status: 'defined', value: 0.25 },
      'Current Ratio': { status: 'defined', value: 1.5 },
    });
    expect(analysis.trends['Current Ratio']).toEqual([
      { ratio: 'Current Ratio', fromPeriodId: '2022', toPeriodId: '2023', delta: 0.5, percentChange: 0.5 },
    ]);
    expect(analysis.diagnostics).toEqual([]);
  });

  it('analyzes one source per statement type', () => {
    const analysis = analyzeStatements({ income: mockIncomeFrame, balance: mockBalanceFrame });

    expect(analysis.results.map((result) => result.periodId)).toEqual(['2021-12-31', '2022-12-31', '2023-12-31']);

    const oldest = analysis.results[0]?.ratios;
    expect(oldest?.ROA).toEqual({ status: 'defined', value: -0.0125 });
    expect(oldest?.ROE).toEqual({ status: 'defined', value: -0.04 });
    expect(oldest?.['Current Ratio']).toEqual({
      status: 'undefined',
      reason: 'missing_input',
      missingFields: ['currentLiabilities'],
    });

    expect(analysis.results[2]?.ratios['Current Ratio']).toEqual({ status: 'defined', value: 2 });
    expect(analysis.trends['Current Ratio'][0]?.delta).toBeNull();

    expect(analysis.diagnostics).toEqual([
      {
        kind: 'invalid_values',
        field: 'currentLiabilities',
        periodIds: ['2021-12-31'],
        message: 'currentLiabilities has non-numeric values in 2021-12-31',
      },
    ]);
  });

  it('explains ratios that are undefined in every period', () => {
    const analysis = analyzeStatements([
      {
        period: '2023',
        values: {
          'Net Income': 5,
          'Total Assets': 50,
          'Total Equity': 'n/a',
          'Current Assets': 10,
          'Current Liabilities': 0,
        },
      },
    ]);

    expect(analysis.results[0]?.ratios.ROA).toEqual({ status: 'defined', value: 0.1 });
    expect(analysis.diagnostics).toEqual([
      {
        kind: 'ratio_unavailable',
        ratio: 'ROE',
        missingFields: ['shareholdersEquity'],
        message: 'ROE could not be calculated: shareholdersEquity not found in any period',
      },
      {
        kind: 'ratio_unavailable',
        ratio: 'Current Ratio',
        missingFields: [],
        message: 'Current Ratio could not be calculated for any period: inputs are missing, the denominator is zero or the result overflows',
      },
      {
        kind: 'invalid_values',
        field: 'shareholdersEquity',
        periodIds: ['2023'],
        message: 'shareholdersEquity has non-numeric values in 2023',
      },
    ]);
  });

  it('accepts a custom alias table', () => {
    const analysis = analyzeStatements([{ period: '2023', values: { netIncome: 8, totalAssets: 80 } }], {
      aliasTable: identityAliasTable(),
    });
    expect(analysis.results[0]?.ratios.ROA).toEqual({ status: 'defined', value: 0.1 });
  });

  it('passes the match mode through to the normalizer', () => {
    const records = [{ period: '2023', values: { 'Net Income Attributable To Parent': 6, 'Total Assets': 60 } }];

    expect(analyzeStatements(records).results[0]?.ratios.ROA.status).toBe('undefined');
    expect(analyzeStatements(records, { matchMode: 'contains' }).results[0]?.ratios.ROA).toEqual({
      status: 'defined',
      value: 0.1,
    });
  });

  it('propagates conflicts between statement types', () => {
    expect(() =>
      analyzeStatements({
        income: [{ period: '2023', values: { 'Net Income': 5 } }],
        cashflow: [{ period: '2023', values: { 'Net Income': 6 } }],
      })
    ).toThrow(ConflictingFieldError);
  });

  it('returns empty output for empty input', () => {
    expect(analyzeStatements([])).toEqual({
      periods: [],
      results: [],
      trends: { ROA: [], ROE: [], 'Current Ratio': [] },
      diagnostics: [],
    });
  });
});
